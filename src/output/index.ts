import type { K8sResource } from '../types/k8s.js';
import type { ConversionOutcome } from '../types/conversion.js';
import { errorMessage } from '../errors.js';
import type { OutputSink, ResourcePrinter } from './printer.js';

export {
  createPrinter,
  isOutputFormat,
  JsonPrinter,
  OUTPUT_FORMATS,
  YamlPrinter,
  type OutputFormat,
  type OutputSink,
  type ResourcePrinter,
} from './printer.js';

export interface RenderSummary {
  printed: number;
  failed: number;
}

type RenderInput = Pick<ConversionOutcome, 'gateways' | 'httpRoutes'>;

/**
 * Print every Gateway, then every HTTPRoute, in the order given. A resource
 * that cannot be printed leaves a comment line on the sink instead.
 */
export function renderResult(
  printer: ResourcePrinter,
  result: RenderInput,
  sink: OutputSink,
): RenderSummary {
  const summary: RenderSummary = { printed: 0, failed: 0 };
  const resources: readonly K8sResource[] = [...result.gateways, ...result.httpRoutes];

  for (const resource of resources) {
    try {
      printer.printObj(resource, sink);
      summary.printed++;
    } catch (err) {
      sink.write(
        `# Error printing ${resource.metadata.name} ${resource.kind}: ${errorMessage(err)}\n`,
      );
      summary.failed++;
    }
  }

  return summary;
}
