#!/usr/bin/env node
import { Command, Option } from 'commander';
import { print } from './commands/print.js';
import { OUTPUT_FORMATS } from './output/index.js';

const program = new Command();

program
  .name('ingress2route')
  .description('Convert Kubernetes Ingress resources to Gateway API resources')
  .version('0.1.0');

// Default command: print
program
  .command('print', { isDefault: true })
  .description('Print Gateways and HTTPRoutes generated from Ingress resources')
  .option('-o, --output <format>', `Output format. One of: (${OUTPUT_FORMATS.join(', ')})`, 'yaml')
  .option(
    '--input_file <path>',
    'Read Ingresses from this manifest file (yaml or json) instead of the cluster',
  )
  .option('-n, --namespace <ns>', 'Namespace scope for this request')
  .addOption(
    new Option(
      '-A, --all-namespaces',
      'Read Ingresses across all namespaces; the namespace of the current context is ignored',
    ).conflicts('namespace'),
  )
  .option('--kubeconfig <path>', 'Path to the kubeconfig file to use')
  .action(print);

await program.parseAsync();
