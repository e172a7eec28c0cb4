import type { HTTPIngressPath, IngressBackend } from '../parser/schema.js';
import {
  GATEWAY_API_VERSION,
  type HTTPBackendRef,
  type HTTPRoute,
  type HTTPRouteRule,
  type PathMatchType,
} from '../types/gateway.js';
import { managedByLabels, nameFromHost, toK8sName } from '../utils/k8s-names.js';

const PATH_MATCH_TYPES: Partial<Record<string, PathMatchType>> = {
  Prefix: 'PathPrefix',
  Exact: 'Exact',
};

/**
 * Map an Ingress backend to an HTTPRoute backendRef. Only service backends
 * with a numeric port have a counterpart.
 */
export function convertBackend(
  backend: IngressBackend,
  errors: string[],
): HTTPBackendRef | undefined {
  if (!backend.service) {
    errors.push(
      backend.resource
        ? `resource backend ${backend.resource.kind}/${backend.resource.name} is not supported`
        : 'backend does not reference a service',
    );
    return undefined;
  }

  const { name, port } = backend.service;
  if (port?.number === undefined) {
    errors.push(
      port?.name
        ? `named port "${port.name}" of service ${name} is not supported`
        : `service ${name} has no port`,
    );
    return undefined;
  }

  return { name, port: port.number };
}

export function convertPath(path: HTTPIngressPath, errors: string[]): HTTPRouteRule | undefined {
  const value = path.path || '/';
  const type = PATH_MATCH_TYPES[path.pathType];
  if (!type) {
    errors.push(`path type "${path.pathType}" of path ${value} is not supported`);
  }
  const backendRef = convertBackend(path.backend, errors);
  if (!type || !backendRef) return undefined;

  return {
    matches: [{ path: { type, value } }],
    backendRefs: [backendRef],
  };
}

export function httpRouteName(ingressName: string, host: string | undefined): string {
  return toK8sName(`${ingressName}-${nameFromHost(host)}`);
}

export interface HTTPRouteInput {
  name: string;
  namespace?: string;
  gatewayName: string;
  host?: string;
  rules: HTTPRouteRule[];
}

export function buildHTTPRoute(input: HTTPRouteInput): HTTPRoute {
  return {
    apiVersion: GATEWAY_API_VERSION,
    kind: 'HTTPRoute',
    metadata: {
      name: input.name,
      ...(input.namespace ? { namespace: input.namespace } : {}),
      labels: managedByLabels(),
    },
    spec: {
      parentRefs: [{ name: input.gatewayName }],
      ...(input.host ? { hostnames: [input.host] } : {}),
      rules: input.rules,
    },
  };
}
