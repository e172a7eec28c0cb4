import type { Ingress } from '../parser/schema.js';
import type { NamespaceScope } from '../namespace/resolver.js';

/**
 * Somewhere Ingresses can be read from. Implementations never modify what
 * they read.
 */
export interface ResourceProvider {
  list(scope: NamespaceScope): Promise<Ingress[]>;
}
