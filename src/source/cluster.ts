import { NetworkingV1Api, type V1Ingress } from '@kubernetes/client-node';
import { ingressSchema, type Ingress } from '../parser/schema.js';
import { formatIssues } from '../parser/ingress.js';
import type { NamespaceScope } from '../namespace/resolver.js';
import { loadKubeConfig } from '../kube/config.js';
import type { ResourceProvider } from './types.js';

interface IngressListResponse {
  items: V1Ingress[];
}

/**
 * The read-only subset of NetworkingV1Api the cluster provider needs.
 */
export interface IngressLister {
  listNamespacedIngress(param: { namespace: string }): Promise<IngressListResponse>;
  listIngressForAllNamespaces(): Promise<IngressListResponse>;
}

export function createIngressLister(kubeconfig?: string): IngressLister {
  return loadKubeConfig(kubeconfig).makeApiClient(NetworkingV1Api);
}

/**
 * Normalize an Ingress returned by the API server into the shape the
 * converter works on. List items come without kind and apiVersion.
 */
export function fromClusterIngress(item: V1Ingress): Ingress {
  const result = ingressSchema.safeParse({
    ...item,
    apiVersion: item.apiVersion ?? 'networking.k8s.io/v1',
    kind: 'Ingress',
  });
  if (!result.success) {
    const name = item.metadata?.name ?? '(unnamed)';
    throw new Error(`Unexpected Ingress ${name} from cluster:\n${formatIssues(result.error)}`);
  }
  return result.data;
}

export class ClusterIngressProvider implements ResourceProvider {
  constructor(private readonly client: IngressLister) {}

  async list(scope: NamespaceScope): Promise<Ingress[]> {
    const response =
      scope.kind === 'all'
        ? await this.client.listIngressForAllNamespaces()
        : await this.client.listNamespacedIngress({ namespace: scope.namespace });
    return response.items.map(fromClusterIngress);
  }
}
