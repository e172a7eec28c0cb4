import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { resolve } from 'node:path';
import { FileIngressProvider } from '../../src/source/file.js';

const fixturesDir = fileURLToPath(new URL('../fixtures/', import.meta.url));
const inputFile = resolve(fixturesDir, 'ingresses.yaml');

describe('FileIngressProvider', () => {
  it('returns every Ingress for all namespaces', async () => {
    const provider = new FileIngressProvider(inputFile);
    const ingresses = await provider.list({ kind: 'all' });

    expect(ingresses.map((i) => i.metadata.name)).toEqual([
      'ingress1',
      'ingress2',
      'ingress-no-namespace',
    ]);
  });

  it('keeps only Ingresses of the named namespace', async () => {
    const provider = new FileIngressProvider(inputFile);
    const ingresses = await provider.list({ kind: 'named', namespace: 'namespace2' });

    expect(ingresses.map((i) => `${i.metadata.namespace}/${i.metadata.name}`)).toEqual([
      'namespace2/ingress2',
    ]);
  });

  it('returns nothing for a namespace without Ingresses', async () => {
    const provider = new FileIngressProvider(inputFile);
    expect(await provider.list({ kind: 'named', namespace: 'namespace3' })).toEqual([]);
  });
});
