import { z } from 'zod';

const serviceBackendPortSchema = z.object({
  name: z.string().optional(),
  number: z.number().int().optional(),
});

const ingressBackendSchema = z.object({
  service: z
    .object({
      name: z.string(),
      port: serviceBackendPortSchema.optional(),
    })
    .optional(),
  resource: z
    .object({
      apiGroup: z.string().optional(),
      kind: z.string(),
      name: z.string(),
    })
    .optional(),
});

const httpIngressPathSchema = z.object({
  path: z.string().optional(),
  pathType: z.string(),
  backend: ingressBackendSchema,
});

const ingressRuleSchema = z.object({
  host: z.string().optional(),
  http: z
    .object({
      paths: z.array(httpIngressPathSchema),
    })
    .optional(),
});

const ingressTLSSchema = z.object({
  hosts: z.array(z.string()).optional(),
  secretName: z.string().optional(),
});

export const ingressSchema = z.object({
  apiVersion: z.string().default('networking.k8s.io/v1'),
  kind: z.literal('Ingress').default('Ingress'),
  metadata: z.object({
    name: z.string(),
    namespace: z.string().optional(),
    labels: z.record(z.string()).optional(),
    annotations: z.record(z.string()).optional(),
  }),
  spec: z
    .object({
      ingressClassName: z.string().optional(),
      defaultBackend: ingressBackendSchema.optional(),
      tls: z.array(ingressTLSSchema).optional(),
      rules: z.array(ingressRuleSchema).optional(),
    })
    .default({}),
});

export type Ingress = z.infer<typeof ingressSchema>;
export type IngressBackend = z.infer<typeof ingressBackendSchema>;
export type HTTPIngressPath = z.infer<typeof httpIngressPathSchema>;
export type IngressInput = z.input<typeof ingressSchema>;

export const INGRESS_KIND = 'Ingress';
