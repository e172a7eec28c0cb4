import { existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { KubeConfig } from '@kubernetes/client-node';
import type { NamespaceLookup } from '../namespace/resolver.js';

export const DEFAULT_NAMESPACE = 'default';

const SERVICE_ACCOUNT_TOKEN = '/var/run/secrets/kubernetes.io/serviceaccount/token';

/**
 * Where the default loading rules would find a kubeconfig, or null when
 * there is none. KubeConfig.loadFromDefault() does not fail in that case; it
 * quietly targets localhost:8080.
 */
export function defaultKubeConfigSource(): string | null {
  const fromEnv = process.env.KUBECONFIG;
  if (fromEnv) return `KUBECONFIG=${fromEnv}`;

  const homeConfig = join(homedir(), '.kube', 'config');
  if (existsSync(homeConfig)) return homeConfig;

  if (process.env.KUBERNETES_SERVICE_HOST && existsSync(SERVICE_ACCOUNT_TOKEN)) {
    return 'in-cluster service account';
  }
  return null;
}

/**
 * Load kubeconfig from an explicit path, or with the default loading rules
 * (KUBECONFIG, ~/.kube/config, in-cluster service account).
 */
export function loadKubeConfig(kubeconfig?: string): KubeConfig {
  const kc = new KubeConfig();
  if (kubeconfig) {
    kc.loadFromFile(kubeconfig);
    return kc;
  }
  if (!defaultKubeConfigSource()) {
    throw new Error('no kubeconfig found: KUBECONFIG is unset and ~/.kube/config does not exist');
  }
  kc.loadFromDefault();
  return kc;
}

/**
 * Namespace of the active context; `default` when the context sets none.
 */
export function currentContextNamespace(kc: KubeConfig): string {
  const contextName = kc.getCurrentContext();
  if (!contextName) {
    throw new Error('no current context is set in kubeconfig');
  }
  const context = kc.getContextObject(contextName);
  if (!context) {
    throw new Error(`context "${contextName}" not found in kubeconfig`);
  }
  return context.namespace || DEFAULT_NAMESPACE;
}

export function kubeconfigNamespaceLookup(kubeconfig?: string): NamespaceLookup {
  return () => currentContextNamespace(loadKubeConfig(kubeconfig));
}
