export interface K8sMetadata {
  name: string;
  namespace?: string;
  labels?: Record<string, string>;
  annotations?: Record<string, string>;
}

/**
 * The fields every object this tool prints carries.
 */
export interface K8sResource {
  apiVersion: string;
  kind: string;
  metadata: K8sMetadata;
}

export interface ResourceRef {
  name: string;
  namespace?: string;
}
