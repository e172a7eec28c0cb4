import { describe, it, expect } from 'vitest';
import { parse as parseYaml, parseAllDocuments } from 'yaml';
import {
  createPrinter,
  JsonPrinter,
  renderResult,
  YamlPrinter,
  type OutputSink,
} from '../../src/output/index.js';
import { UnsupportedFormatError } from '../../src/errors.js';
import type { Gateway, HTTPRoute } from '../../src/types/gateway.js';

class MemorySink implements OutputSink {
  chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  get text(): string {
    return this.chunks.join('');
  }
}

function gateway(name: string): Gateway {
  return {
    apiVersion: 'gateway.networking.k8s.io/v1',
    kind: 'Gateway',
    metadata: { name, namespace: 'edge' },
    spec: { gatewayClassName: name, listeners: [{ name: 'http', port: 80, protocol: 'HTTP' }] },
  };
}

function httpRoute(name: string): HTTPRoute {
  return {
    apiVersion: 'gateway.networking.k8s.io/v1',
    kind: 'HTTPRoute',
    metadata: { name, namespace: 'edge' },
    spec: {
      parentRefs: [{ name: 'nginx' }],
      rules: [{ backendRefs: [{ name: 'web', port: 80 }] }],
    },
  };
}

/** A route whose port cannot be serialized as JSON. */
function unserializableRoute(name: string): HTTPRoute {
  const route = httpRoute(name);
  Object.defineProperty(route.spec.rules[0].backendRefs[0], 'port', {
    enumerable: true,
    get: () => {
      throw new Error('port is not readable');
    },
  });
  return route;
}

describe('createPrinter', () => {
  it('creates a YAML printer by default', () => {
    expect(createPrinter('')).toBeInstanceOf(YamlPrinter);
    expect(createPrinter('yaml')).toBeInstanceOf(YamlPrinter);
  });

  it('creates a JSON printer', () => {
    expect(createPrinter('json')).toBeInstanceOf(JsonPrinter);
  });

  it('rejects other formats', () => {
    expect(() => createPrinter('xml')).toThrow(UnsupportedFormatError);
    expect(() => createPrinter('xml')).toThrow('xml is not a supported output format');
  });
});

describe('renderResult', () => {
  it('prints gateways before routes, each in order', () => {
    const sink = new MemorySink();
    const summary = renderResult(
      new YamlPrinter(),
      { gateways: [gateway('a'), gateway('b')], httpRoutes: [httpRoute('c'), httpRoute('d')] },
      sink,
    );

    expect(summary).toEqual({ printed: 4, failed: 0 });
    const docs = parseAllDocuments(sink.text);
    expect(docs.map((d) => d.get('kind'))).toEqual(['Gateway', 'Gateway', 'HTTPRoute', 'HTTPRoute']);
    expect(sink.text.startsWith('apiVersion: ')).toBe(true);
    expect(sink.chunks.filter((c) => c === '---\n')).toHaveLength(3);
  });

  it('round-trips YAML output', () => {
    const sink = new MemorySink();
    const route = httpRoute('web');
    renderResult(new YamlPrinter(), { gateways: [], httpRoutes: [route] }, sink);

    expect(parseYaml(sink.text)).toEqual(route);
  });

  it('round-trips JSON output', () => {
    const sink = new MemorySink();
    const gw = gateway('nginx');
    renderResult(new JsonPrinter(), { gateways: [gw], httpRoutes: [] }, sink);

    expect(JSON.parse(sink.text)).toEqual(gw);
  });

  it('keeps printing after a resource fails to serialize', () => {
    const sink = new MemorySink();
    const summary = renderResult(
      new JsonPrinter(),
      { gateways: [gateway('a')], httpRoutes: [unserializableRoute('bad'), httpRoute('good')] },
      sink,
    );

    expect(summary).toEqual({ printed: 2, failed: 1 });
    expect(sink.chunks[1]).toBe('# Error printing bad HTTPRoute: port is not readable\n');
    expect(JSON.parse(sink.chunks[2]).metadata.name).toBe('good');
  });

  it('does not leave a dangling separator for a failed YAML document', () => {
    const sink = new MemorySink();
    renderResult(
      new YamlPrinter(),
      { gateways: [], httpRoutes: [unserializableRoute('bad'), httpRoute('good')] },
      sink,
    );

    expect(sink.chunks[0]).toBe('# Error printing bad HTTPRoute: port is not readable\n');
    expect(sink.chunks[1].startsWith('apiVersion: ')).toBe(true);
    expect(sink.chunks).toHaveLength(2);
  });
});
