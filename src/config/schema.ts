import { z } from 'zod';

/**
 * Options of the print command as they arrive from the CLI.
 */
export const printOptionsSchema = z
  .object({
    output: z.string().default('yaml'),
    inputFile: z.string().min(1).optional(),
    namespace: z.string().optional(),
    allNamespaces: z.boolean().default(false),
    kubeconfig: z.string().min(1).optional(),
  })
  .refine((opts) => !(opts.allNamespaces && opts.namespace), {
    message: '--namespace and --all-namespaces cannot be used together',
    path: ['namespace'],
  });

export type PrintOptions = z.infer<typeof printOptionsSchema>;
export type PrintOptionsInput = z.input<typeof printOptionsSchema>;
