import type { Ingress } from './parser/schema.js';
import type { ConversionOutcome, Converter } from './types/conversion.js';
import { ConversionFailedError, PipelineError, type PipelineStage } from './errors.js';
import {
  resolveNamespace,
  type NamespaceLookup,
  type NamespaceScope,
} from './namespace/resolver.js';
import { fetchIngresses, type ResourceProvider } from './source/index.js';
import {
  createPrinter,
  renderResult,
  type OutputSink,
  type RenderSummary,
  type ResourcePrinter,
} from './output/index.js';

export interface PrintRequest {
  outputFormat: string;
  inputFile?: string;
  namespace?: string;
  allNamespaces: boolean;
}

export interface PipelineDeps {
  lookupNamespace: NamespaceLookup;
  createProvider: (inputFile: string | undefined) => ResourceProvider;
  convert: Converter;
  sink: OutputSink;
  onWarning?: (message: string) => void;
}

export interface PrintResult {
  scope: NamespaceScope;
  ingresses: Ingress[];
  outcome: ConversionOutcome;
  render: RenderSummary;
}

async function stage<T>(name: PipelineStage, run: () => T | Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (err) {
    throw new PipelineError(name, err);
  }
}

/**
 * Call the converter once and refuse partial results.
 */
export function invokeConverter(convert: Converter, ingresses: readonly Ingress[]): ConversionOutcome {
  const outcome = convert(ingresses);
  if (outcome.errors.length > 0) {
    throw new ConversionFailedError(outcome.errors);
  }
  return outcome;
}

/**
 * Resolve the namespace, read Ingresses, convert them and print the
 * resulting Gateways and HTTPRoutes. Stages run strictly in order; any
 * stage but rendering ends the run on failure.
 */
export async function runPrint(request: PrintRequest, deps: PipelineDeps): Promise<PrintResult> {
  const printer: ResourcePrinter = await stage('configure', () =>
    createPrinter(request.outputFormat),
  );

  const { scope, warnings } = await stage('resolve-namespace', () =>
    resolveNamespace({
      namespace: request.namespace,
      allNamespaces: request.allNamespaces,
      inputFileGiven: Boolean(request.inputFile),
      lookup: deps.lookupNamespace,
    }),
  );
  for (const warning of warnings) {
    deps.onWarning?.(warning);
  }

  const ingresses = await stage('fetch', () =>
    fetchIngresses(deps.createProvider(request.inputFile), scope),
  );

  const outcome = await stage('convert', () => invokeConverter(deps.convert, ingresses));

  const render = renderResult(printer, outcome, deps.sink);

  return { scope, ingresses, outcome, render };
}
