import type { Ingress } from '../parser/schema.js';
import { GATEWAY_API_VERSION, type Gateway, type Listener } from '../types/gateway.js';
import { managedByLabels, nameFromHost, toK8sName, uniqueName } from '../utils/k8s-names.js';

export const INGRESS_CLASS_ANNOTATION = 'kubernetes.io/ingress.class';

export function ingressClassOf(ingress: Ingress): string | undefined {
  return (
    ingress.spec.ingressClassName ?? ingress.metadata.annotations?.[INGRESS_CLASS_ANNOTATION]
  );
}

export function gatewayName(ingressClass: string): string {
  return toK8sName(ingressClass);
}

export function httpListener(host: string | undefined): Listener {
  return {
    name: host ? `${nameFromHost(host)}-http` : 'http',
    ...(host ? { hostname: host } : {}),
    port: 80,
    protocol: 'HTTP',
  };
}

export function httpsListener(host: string | undefined, secretName: string): Listener {
  return {
    name: host ? `${nameFromHost(host)}-https` : 'https',
    ...(host ? { hostname: host } : {}),
    port: 443,
    protocol: 'HTTPS',
    tls: {
      mode: 'Terminate',
      certificateRefs: [{ kind: 'Secret', name: secretName }],
    },
  };
}

/**
 * Listeners an Ingress needs: HTTP for every host it routes, HTTPS for
 * every host it terminates TLS for.
 */
export function listenersFor(ingress: Ingress, errors: string[]): Listener[] {
  const listeners: Listener[] = [];
  const { rules = [], tls = [], defaultBackend } = ingress.spec;

  for (const rule of rules) {
    listeners.push(httpListener(rule.host));
  }
  if (defaultBackend) {
    listeners.push(httpListener(undefined));
  }

  for (const entry of tls) {
    if (!entry.secretName) {
      errors.push('TLS entry without secretName is not supported');
      continue;
    }
    const hosts = entry.hosts?.length ? entry.hosts : [undefined];
    for (const host of hosts) {
      listeners.push(httpsListener(host, entry.secretName));
    }
  }

  return listeners;
}

export function buildGateway(namespace: string | undefined, ingressClass: string): Gateway {
  return {
    apiVersion: GATEWAY_API_VERSION,
    kind: 'Gateway',
    metadata: {
      name: gatewayName(ingressClass),
      ...(namespace ? { namespace } : {}),
      labels: managedByLabels(),
    },
    spec: {
      gatewayClassName: ingressClass,
      listeners: [],
    },
  };
}

function sameEndpoint(a: Listener, b: Listener): boolean {
  return a.hostname === b.hostname && a.port === b.port && a.protocol === b.protocol;
}

function secretOf(listener: Listener): string | undefined {
  return listener.tls?.certificateRefs[0]?.name;
}

/**
 * Add listeners to a Gateway. A listener for a hostname, port and protocol
 * the Gateway already serves is merged; one that asks for a different TLS
 * secret there is a conflict. Names are made unique. On any conflict the
 * Gateway is left untouched and the conflicts are returned.
 */
export function addListeners(gateway: Gateway, listeners: Listener[]): string[] {
  const merged = [...gateway.spec.listeners];
  const conflicts: string[] = [];

  for (const listener of listeners) {
    const existing = merged.find((l) => sameEndpoint(l, listener));
    if (existing) {
      if (secretOf(existing) !== secretOf(listener)) {
        conflicts.push(
          `${listener.protocol} listener for ${listener.hostname ?? 'all hosts'} on port ${listener.port} ` +
            `already uses secret ${secretOf(existing) ?? '(none)'}, not ${secretOf(listener) ?? '(none)'}`,
        );
      }
      continue;
    }
    const taken = new Set(merged.map((l) => l.name));
    merged.push({ ...listener, name: uniqueName(listener.name, taken) });
  }

  if (conflicts.length === 0) {
    gateway.spec.listeners = merged;
  }
  return conflicts;
}
