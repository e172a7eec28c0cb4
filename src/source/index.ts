import type { Ingress } from '../parser/schema.js';
import type { NamespaceScope } from '../namespace/resolver.js';
import { NoResourcesError } from '../errors.js';
import { FileIngressProvider } from './file.js';
import { ClusterIngressProvider, createIngressLister, type IngressLister } from './cluster.js';
import type { ResourceProvider } from './types.js';

export type { ResourceProvider } from './types.js';
export { FileIngressProvider } from './file.js';
export { ClusterIngressProvider, type IngressLister } from './cluster.js';

export interface ProviderOptions {
  inputFile?: string;
  kubeconfig?: string;
  /** Builds the cluster client; replaced in tests. */
  createLister?: (kubeconfig?: string) => IngressLister;
}

/**
 * Pick where Ingresses come from: the input file when one is given,
 * otherwise the cluster of the active kubeconfig context.
 */
export function createProvider(options: ProviderOptions): ResourceProvider {
  if (options.inputFile) {
    return new FileIngressProvider(options.inputFile);
  }
  const createLister = options.createLister ?? createIngressLister;
  return new ClusterIngressProvider(createLister(options.kubeconfig));
}

/**
 * List Ingresses in scope, failing when there are none.
 */
export async function fetchIngresses(
  provider: ResourceProvider,
  scope: NamespaceScope,
): Promise<Ingress[]> {
  const ingresses = await provider.list(scope);
  if (ingresses.length === 0) {
    throw new NoResourcesError(scope.kind === 'named' ? scope.namespace : undefined);
  }
  return ingresses;
}
