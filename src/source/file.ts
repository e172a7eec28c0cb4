import { resolve } from 'node:path';
import { parseIngressFile } from '../parser/ingress.js';
import { scopeIncludes, type NamespaceScope } from '../namespace/resolver.js';
import type { Ingress } from '../parser/schema.js';
import type { ResourceProvider } from './types.js';

export class FileIngressProvider implements ResourceProvider {
  private readonly file: string;

  constructor(file: string) {
    this.file = resolve(file);
  }

  async list(scope: NamespaceScope): Promise<Ingress[]> {
    const ingresses = await parseIngressFile(this.file);
    return ingresses.filter((ing) => scopeIncludes(scope, ing.metadata.namespace));
  }
}
