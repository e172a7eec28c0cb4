import { readFile } from 'node:fs/promises';
import { parseAllDocuments } from 'yaml';
import type { ZodError } from 'zod';
import { INGRESS_KIND, ingressSchema, type Ingress } from './schema.js';
import { errorMessage } from '../errors.js';

/**
 * Format zod issues the way the rest of the tool reports invalid input.
 */
export function formatIssues(err: ZodError): string {
  return err.issues
    .map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('\n');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse every Ingress out of a multi-document YAML (or JSON) stream.
 * Documents of any other kind, and empty documents, are skipped.
 */
export function parseIngressDocuments(content: string, source: string): Ingress[] {
  const ingresses: Ingress[] = [];
  const docs = parseAllDocuments(content);

  docs.forEach((doc, index) => {
    const first = doc.errors[0];
    if (first) {
      throw new Error(`Failed to parse YAML document ${index + 1} in ${source}: ${first.message}`);
    }

    const raw: unknown = doc.toJS();
    if (!isRecord(raw) || raw.kind !== INGRESS_KIND) return;

    const result = ingressSchema.safeParse(raw);
    if (!result.success) {
      throw new Error(
        `Invalid Ingress in document ${index + 1} of ${source}:\n${formatIssues(result.error)}`,
      );
    }
    ingresses.push(result.data);
  });

  return ingresses;
}

/**
 * Read Ingresses from a manifest file on disk.
 */
export async function parseIngressFile(file: string): Promise<Ingress[]> {
  let content: string;
  try {
    content = await readFile(file, 'utf-8');
  } catch (err) {
    throw new Error(`Failed to read ${file}: ${errorMessage(err)}`, { cause: err });
  }
  return parseIngressDocuments(content, file);
}
