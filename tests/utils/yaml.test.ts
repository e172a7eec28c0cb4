import { describe, it, expect } from 'vitest';
import { parse as parseYaml } from 'yaml';
import { orderResourceKeys, resourceToJson, resourceToYaml } from '../../src/utils/yaml.js';
import type { K8sResource } from '../../src/types/k8s.js';

interface ResourceWithSpec extends K8sResource {
  spec: Record<string, unknown>;
  extra?: string;
}

describe('orderResourceKeys', () => {
  it('puts apiVersion, kind, metadata, spec first and drops undefined fields', () => {
    const resource: ResourceWithSpec = {
      spec: { gatewayClassName: 'nginx' },
      extra: undefined,
      kind: 'Gateway',
      apiVersion: 'gateway.networking.k8s.io/v1',
      metadata: { name: 'nginx' },
    };

    expect(Object.keys(orderResourceKeys(resource))).toEqual([
      'apiVersion',
      'kind',
      'metadata',
      'spec',
    ]);
  });
});

describe('resourceToYaml', () => {
  it('serializes with correct key ordering', () => {
    const resource: ResourceWithSpec = {
      spec: { rules: [] },
      kind: 'HTTPRoute',
      apiVersion: 'gateway.networking.k8s.io/v1',
      metadata: { name: 'test' },
    };

    const yaml = resourceToYaml(resource);
    const lines = yaml.split('\n');

    const apiVersionIdx = lines.findIndex((l) => l.startsWith('apiVersion'));
    const kindIdx = lines.findIndex((l) => l.startsWith('kind'));
    const metadataIdx = lines.findIndex((l) => l.startsWith('metadata'));
    const specIdx = lines.findIndex((l) => l.startsWith('spec'));

    expect(apiVersionIdx).toBe(0);
    expect(apiVersionIdx).toBeLessThan(kindIdx);
    expect(kindIdx).toBeLessThan(metadataIdx);
    expect(metadataIdx).toBeLessThan(specIdx);
  });

  it('uses 2-space indentation', () => {
    const resource: K8sResource = {
      apiVersion: 'gateway.networking.k8s.io/v1',
      kind: 'Gateway',
      metadata: { name: 'test', namespace: 'edge' },
    };

    expect(resourceToYaml(resource)).toBe(
      'apiVersion: gateway.networking.k8s.io/v1\n' +
        'kind: Gateway\n' +
        'metadata:\n' +
        '  name: test\n' +
        '  namespace: edge\n',
    );
  });

  it('parses back to the same object', () => {
    const resource: ResourceWithSpec = {
      apiVersion: 'gateway.networking.k8s.io/v1',
      kind: 'HTTPRoute',
      metadata: { name: 'shop', namespace: 'store', labels: { tier: 'front' } },
      spec: {
        hostnames: ['shop.example.com'],
        rules: [{ matches: [{ path: { type: 'PathPrefix', value: '/' } }] }],
      },
    };

    expect(parseYaml(resourceToYaml(resource))).toEqual(resource);
  });
});

describe('resourceToJson', () => {
  it('indents with four spaces and ends with a newline', () => {
    const resource: K8sResource = {
      apiVersion: 'gateway.networking.k8s.io/v1',
      kind: 'Gateway',
      metadata: { name: 'test' },
    };

    expect(resourceToJson(resource)).toBe(
      '{\n' +
        '    "apiVersion": "gateway.networking.k8s.io/v1",\n' +
        '    "kind": "Gateway",\n' +
        '    "metadata": {\n' +
        '        "name": "test"\n' +
        '    }\n' +
        '}\n',
    );
  });
});
