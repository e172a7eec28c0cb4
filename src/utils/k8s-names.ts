/**
 * Turn an arbitrary string into a valid K8s resource name.
 * Lowercase, replace _/. with -, max 63 chars, must start/end alphanumeric.
 */
export function toK8sName(value: string): string {
  let name = value
    .toLowerCase()
    .replace(/[_.]/g, '-')
    .replace(/[^a-z0-9-]/g, '')
    .replace(/-+/g, '-')
    .replace(/^-/, '')
    .replace(/-$/, '');

  if (name.length > 63) {
    name = name.slice(0, 63).replace(/-$/, '');
  }

  return name || 'unnamed';
}

/**
 * Name fragment for a hostname. Rules without a host match every host.
 */
export function nameFromHost(host: string | undefined): string {
  if (!host) return 'all-hosts';
  return toK8sName(host.replace(/^\*\./, 'wildcard.'));
}

/**
 * `base`, or `base-2`, `base-3`, ... when that name is taken.
 */
export function uniqueName(base: string, taken: ReadonlySet<string>): string {
  if (!taken.has(base)) return base;
  for (let n = 2; ; n++) {
    const suffix = `-${n}`;
    const candidate = `${base.slice(0, 63 - suffix.length).replace(/-$/, '')}${suffix}`;
    if (!taken.has(candidate)) return candidate;
  }
}

export function managedByLabels(): Record<string, string> {
  return {
    'app.kubernetes.io/managed-by': 'ingress2route',
  };
}
