import { NamespaceResolutionError } from '../errors.js';

/**
 * What the caller asked for, before the ambient context is consulted.
 */
export type NamespaceSelection =
  | { kind: 'all' }
  | { kind: 'named'; namespace: string }
  | { kind: 'unresolved' };

/**
 * The namespace scope a run works in once resolution has succeeded.
 */
export type NamespaceScope = { kind: 'all' } | { kind: 'named'; namespace: string };

/**
 * Returns the namespace of the active context, or throws when it cannot be
 * determined.
 */
export type NamespaceLookup = () => string;

export const ALL_NAMESPACES: NamespaceScope = { kind: 'all' };

export function namedScope(namespace: string): NamespaceScope {
  return { kind: 'named', namespace };
}

export function namespaceSelection(
  namespace: string | undefined,
  allNamespaces: boolean,
): NamespaceSelection {
  if (allNamespaces) return { kind: 'all' };
  if (namespace) return { kind: 'named', namespace };
  return { kind: 'unresolved' };
}

export function scopeIncludes(scope: NamespaceScope, namespace: string | undefined): boolean {
  return scope.kind === 'all' || scope.namespace === namespace;
}

export interface ResolveNamespaceInput {
  namespace?: string;
  allNamespaces: boolean;
  inputFileGiven: boolean;
  lookup: NamespaceLookup;
}

export interface ResolveNamespaceResult {
  scope: NamespaceScope;
  warnings: string[];
}

/**
 * Decide which namespaces a run covers.
 *
 * `allNamespaces` always wins. Without an explicit namespace the active
 * context is asked; if that fails, a file-backed run falls back to all
 * namespaces while a cluster-backed run cannot continue.
 */
export function resolveNamespace(input: ResolveNamespaceInput): ResolveNamespaceResult {
  const warnings: string[] = [];

  if (input.allNamespaces && input.namespace) {
    warnings.push(
      `--namespace "${input.namespace}" is ignored because --all-namespaces is set.`,
    );
  }

  const selection = namespaceSelection(input.namespace, input.allNamespaces);
  switch (selection.kind) {
    case 'all':
      return { scope: ALL_NAMESPACES, warnings };
    case 'named':
      return { scope: namedScope(selection.namespace), warnings };
    case 'unresolved':
      break;
  }

  let current: string;
  try {
    current = input.lookup();
  } catch (err) {
    if (input.inputFileGiven) {
      return { scope: ALL_NAMESPACES, warnings };
    }
    throw new NamespaceResolutionError(err);
  }

  if (!current) {
    if (input.inputFileGiven) return { scope: ALL_NAMESPACES, warnings };
    throw new NamespaceResolutionError(new Error('the current context sets no namespace'));
  }

  return { scope: namedScope(current), warnings };
}
