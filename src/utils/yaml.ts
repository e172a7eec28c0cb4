import { stringify } from 'yaml';
import type { K8sResource } from '../types/k8s.js';

const KEY_ORDER = ['apiVersion', 'kind', 'metadata', 'spec', 'status'];

/**
 * Copy a resource with K8s key ordering; undefined fields are dropped.
 */
export function orderResourceKeys(resource: K8sResource): Record<string, unknown> {
  const fields = new Map(Object.entries(resource));
  const ordered: Record<string, unknown> = {};

  for (const key of KEY_ORDER) {
    const value = fields.get(key);
    if (value !== undefined) {
      ordered[key] = value;
    }
  }

  // Add any remaining keys
  for (const [key, value] of fields) {
    if (!(key in ordered) && value !== undefined) {
      ordered[key] = value;
    }
  }

  return ordered;
}

/**
 * Serialize a K8s resource to YAML with proper ordering.
 */
export function resourceToYaml(resource: K8sResource): string {
  return stringify(orderResourceKeys(resource), {
    indent: 2,
    lineWidth: 0,
    defaultStringType: 'PLAIN',
    defaultKeyType: 'PLAIN',
    nullStr: '',
  });
}

/**
 * Serialize a K8s resource to indented JSON, newline terminated.
 */
export function resourceToJson(resource: K8sResource): string {
  return `${JSON.stringify(orderResourceKeys(resource), null, 4)}\n`;
}
