import type { K8sResource } from './k8s.js';

export const GATEWAY_API_VERSION = 'gateway.networking.k8s.io/v1';

export interface SecretObjectReference {
  kind?: 'Secret';
  name: string;
  namespace?: string;
}

export interface GatewayTLSConfig {
  mode: 'Terminate';
  certificateRefs: SecretObjectReference[];
}

export interface Listener {
  name: string;
  hostname?: string;
  port: number;
  protocol: 'HTTP' | 'HTTPS';
  tls?: GatewayTLSConfig;
}

export interface GatewaySpec {
  gatewayClassName: string;
  listeners: Listener[];
}

export interface Gateway extends K8sResource {
  kind: 'Gateway';
  spec: GatewaySpec;
}

export interface ParentReference {
  name: string;
  namespace?: string;
}

export type PathMatchType = 'Exact' | 'PathPrefix';

export interface HTTPRouteMatch {
  path: {
    type: PathMatchType;
    value: string;
  };
}

export interface HTTPBackendRef {
  name: string;
  port: number;
}

export interface HTTPRouteRule {
  matches?: HTTPRouteMatch[];
  backendRefs: HTTPBackendRef[];
}

export interface HTTPRouteSpec {
  parentRefs: ParentReference[];
  hostnames?: string[];
  rules: HTTPRouteRule[];
}

export interface HTTPRoute extends K8sResource {
  kind: 'HTTPRoute';
  spec: HTTPRouteSpec;
}
