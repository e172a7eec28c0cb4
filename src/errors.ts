import type { ConversionError } from './types/conversion.js';

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class UnsupportedFormatError extends Error {
  constructor(readonly format: string) {
    super(`${format} is not a supported output format`);
    this.name = 'UnsupportedFormatError';
  }
}

export class NamespaceResolutionError extends Error {
  constructor(cause: unknown) {
    super(`unable to determine the namespace of the current context: ${errorMessage(cause)}`, {
      cause,
    });
    this.name = 'NamespaceResolutionError';
  }
}

export class NoResourcesError extends Error {
  constructor(readonly namespace?: string) {
    super(namespace ? `No resources found in ${namespace} namespace` : 'No resources found');
    this.name = 'NoResourcesError';
  }
}

export function describeConversionError(err: ConversionError): string {
  const { name, namespace } = err.ingress;
  return `${namespace ? `${namespace}/${name}` : name}: ${err.message}`;
}

/**
 * Every per-Ingress failure of one conversion, reported together.
 */
export class ConversionFailedError extends Error {
  constructor(readonly errors: readonly ConversionError[]) {
    super(
      [
        `Encountered ${errors.length} ${errors.length === 1 ? 'error' : 'errors'}`,
        ...errors.map((e) => ` # ${describeConversionError(e)}`),
      ].join('\n'),
    );
    this.name = 'ConversionFailedError';
  }
}

export type PipelineStage = 'configure' | 'resolve-namespace' | 'fetch' | 'convert';

const STAGE_DESCRIPTIONS: Record<PipelineStage, string> = {
  configure: 'initialize resource printer',
  'resolve-namespace': 'initialize namespace filter',
  fetch: 'get ingresses from source',
  convert: 'convert ingresses',
};

/**
 * A fatal failure of one pipeline stage. The original error stays in `cause`.
 */
export class PipelineError extends Error {
  constructor(
    readonly stage: PipelineStage,
    cause: unknown,
  ) {
    super(`failed to ${STAGE_DESCRIPTIONS[stage]}: ${errorMessage(cause)}`, { cause });
    this.name = 'PipelineError';
  }
}
