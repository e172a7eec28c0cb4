import type { K8sResource } from '../types/k8s.js';
import { UnsupportedFormatError } from '../errors.js';
import { resourceToJson, resourceToYaml } from '../utils/yaml.js';

export const OUTPUT_FORMATS = ['yaml', 'json'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/**
 * Where rendered resources go. `process.stdout` satisfies it.
 */
export interface OutputSink {
  write(chunk: string): unknown;
}

export interface ResourcePrinter {
  printObj(resource: K8sResource, sink: OutputSink): void;
}

/**
 * Prints YAML documents, separating each from the previous one with `---`.
 */
export class YamlPrinter implements ResourcePrinter {
  private printCount = 0;

  printObj(resource: K8sResource, sink: OutputSink): void {
    const text = resourceToYaml(resource);
    if (this.printCount > 0) {
      sink.write('---\n');
    }
    this.printCount++;
    sink.write(text);
  }
}

export class JsonPrinter implements ResourcePrinter {
  printObj(resource: K8sResource, sink: OutputSink): void {
    sink.write(resourceToJson(resource));
  }
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Printer for a requested output format. An empty format means YAML.
 */
export function createPrinter(format: string): ResourcePrinter {
  const requested = format || 'yaml';
  if (!isOutputFormat(requested)) {
    throw new UnsupportedFormatError(format);
  }
  return requested === 'json' ? new JsonPrinter() : new YamlPrinter();
}
