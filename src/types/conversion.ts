import type { Ingress } from '../parser/schema.js';
import type { Gateway, HTTPRoute } from './gateway.js';
import type { ResourceRef } from './k8s.js';

export interface ConversionError {
  message: string;
  ingress: ResourceRef;
}

export interface ConversionOutcome {
  readonly gateways: readonly Gateway[];
  readonly httpRoutes: readonly HTTPRoute[];
  readonly errors: readonly ConversionError[];
}

/**
 * Translates Ingresses into Gateway API resources. Must not throw for
 * per-Ingress problems; those are reported in `errors`.
 */
export type Converter = (ingresses: readonly Ingress[]) => ConversionOutcome;
