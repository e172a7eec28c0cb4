import * as p from '@clack/prompts';
import chalk from 'chalk';
import { printOptionsSchema } from '../config/schema.js';
import { formatIssues } from '../parser/ingress.js';
import { runPrint } from '../pipeline.js';
import { createProvider } from '../source/index.js';
import { convertIngresses } from '../converter/index.js';
import { kubeconfigNamespaceLookup } from '../kube/config.js';
import {
  ConversionFailedError,
  describeConversionError,
  errorMessage,
  PipelineError,
} from '../errors.js';

export interface PrintCliOptions {
  output?: string;
  input_file?: string;
  namespace?: string;
  allNamespaces?: boolean;
  kubeconfig?: string;
}

/**
 * Resolver warnings go to stderr: stdout carries the manifests, and a run
 * that warns still prints them.
 */
export function reportWarning(message: string): void {
  console.error(chalk.yellow(`warning: ${message}`));
}

function reportFailure(err: unknown): void {
  const cause = err instanceof PipelineError ? err.cause : undefined;
  if (err instanceof PipelineError && cause instanceof ConversionFailedError) {
    p.log.error(`failed to convert ingresses: encountered ${cause.errors.length} error(s)`);
    for (const conversionError of cause.errors) {
      p.log.message(chalk.yellow(describeConversionError(conversionError)));
    }
    return;
  }
  p.log.error(errorMessage(err));
}

/**
 * Print Gateways and HTTPRoutes converted from the Ingresses of a file or
 * of the current cluster.
 */
export async function print(options: PrintCliOptions): Promise<void> {
  const parsed = printOptionsSchema.safeParse({
    output: options.output,
    inputFile: options.input_file,
    namespace: options.namespace,
    allNamespaces: options.allNamespaces,
    kubeconfig: options.kubeconfig,
  });
  if (!parsed.success) {
    p.log.error(`Invalid options:\n${formatIssues(parsed.error)}`);
    process.exit(1);
  }
  const opts = parsed.data;

  try {
    await runPrint(
      {
        outputFormat: opts.output,
        inputFile: opts.inputFile,
        namespace: opts.namespace,
        allNamespaces: opts.allNamespaces,
      },
      {
        lookupNamespace: kubeconfigNamespaceLookup(opts.kubeconfig),
        createProvider: (inputFile) => createProvider({ inputFile, kubeconfig: opts.kubeconfig }),
        convert: convertIngresses,
        sink: process.stdout,
        onWarning: reportWarning,
      },
    );
  } catch (err) {
    reportFailure(err);
    process.exit(1);
  }
}
