import type { Ingress } from '../parser/schema.js';
import type { Gateway, HTTPRoute, HTTPRouteRule, Listener } from '../types/gateway.js';
import type { ConversionError, ConversionOutcome } from '../types/conversion.js';
import { addListeners, buildGateway, gatewayName, ingressClassOf, listenersFor } from './gateway.js';
import { buildHTTPRoute, convertBackend, convertPath, httpRouteName } from './httproute.js';
import { uniqueName } from '../utils/k8s-names.js';

interface IngressTranslation {
  ingressClass: string;
  listeners: Listener[];
  /** Route rules keyed by host; '' holds rules that match every host. */
  rulesByHost: Map<string, HTTPRouteRule[]>;
}

function rulesFor(rulesByHost: Map<string, HTTPRouteRule[]>, host: string): HTTPRouteRule[] {
  let rules = rulesByHost.get(host);
  if (!rules) {
    rules = [];
    rulesByHost.set(host, rules);
  }
  return rules;
}

function translateIngress(ingress: Ingress, errors: string[]): IngressTranslation | undefined {
  const ingressClass = ingressClassOf(ingress);
  if (!ingressClass) {
    errors.push('no ingress class set in spec.ingressClassName or kubernetes.io/ingress.class');
  }

  const listeners = listenersFor(ingress, errors);
  const rulesByHost = new Map<string, HTTPRouteRule[]>();

  for (const rule of ingress.spec.rules ?? []) {
    const rules = rulesFor(rulesByHost, rule.host ?? '');
    for (const path of rule.http?.paths ?? []) {
      const converted = convertPath(path, errors);
      if (converted) rules.push(converted);
    }
  }

  if (ingress.spec.defaultBackend) {
    const backendRef = convertBackend(ingress.spec.defaultBackend, errors);
    if (backendRef) rulesFor(rulesByHost, '').push({ backendRefs: [backendRef] });
  }

  if (!ingressClass || errors.length > 0) return undefined;
  return { ingressClass, listeners, rulesByHost };
}

/**
 * Convert Ingresses into Gateways and HTTPRoutes.
 *
 * Ingresses sharing a namespace and ingress class share one Gateway; each
 * Ingress gets one HTTPRoute per host. Listener and route names that would
 * collide get a numeric suffix. An Ingress that cannot be converted
 * completely, or whose TLS secret conflicts with one already on the shared
 * Gateway, is reported in `errors` and contributes nothing.
 */
export function convertIngresses(ingresses: readonly Ingress[]): ConversionOutcome {
  const gateways = new Map<string, Gateway>();
  const httpRoutes = new Map<string, HTTPRoute>();
  const errors: ConversionError[] = [];
  // HTTPRoute names in use, per namespace
  const routeNames = new Map<string, Set<string>>();

  for (const ingress of ingresses) {
    const { name, namespace } = ingress.metadata;
    const messages: string[] = [];
    const translation = translateIngress(ingress, messages);
    if (!translation) {
      for (const message of messages) {
        errors.push({ message, ingress: { name, ...(namespace ? { namespace } : {}) } });
      }
      continue;
    }

    const gatewayKey = `${namespace ?? ''}/${translation.ingressClass}`;
    const gateway = gateways.get(gatewayKey) ?? buildGateway(namespace, translation.ingressClass);
    const conflicts = addListeners(gateway, translation.listeners);
    if (conflicts.length > 0) {
      for (const message of conflicts) {
        errors.push({ message, ingress: { name, ...(namespace ? { namespace } : {}) } });
      }
      continue;
    }
    gateways.set(gatewayKey, gateway);

    let takenRouteNames = routeNames.get(namespace ?? '');
    if (!takenRouteNames) {
      takenRouteNames = new Set();
      routeNames.set(namespace ?? '', takenRouteNames);
    }

    for (const [host, rules] of translation.rulesByHost) {
      if (rules.length === 0) continue;
      const routeKey = `${namespace ?? ''}/${name}/${host}`;
      const existing = httpRoutes.get(routeKey);
      if (existing) {
        existing.spec.rules.push(...rules);
        continue;
      }
      const routeName = uniqueName(httpRouteName(name, host || undefined), takenRouteNames);
      takenRouteNames.add(routeName);
      httpRoutes.set(
        routeKey,
        buildHTTPRoute({
          name: routeName,
          namespace,
          gatewayName: gatewayName(translation.ingressClass),
          host: host || undefined,
          rules,
        }),
      );
    }
  }

  return Object.freeze({
    gateways: Object.freeze([...gateways.values()]),
    httpRoutes: Object.freeze([...httpRoutes.values()]),
    errors: Object.freeze(errors),
  });
}
