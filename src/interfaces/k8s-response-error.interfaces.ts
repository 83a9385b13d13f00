import { isObject } from '@/utils/is-object';

// Mirrors the HttpError thrown by @kubernetes/client-node for non-2xx responses

export type K8sStatusBody = {
  apiVersion?: string;
  code?: number;
  details?: { name?: string; group?: string; kind?: string };
  kind?: string; // 'Status'
  message?: string; // 'deployments.apps "demo-app" already exists'
  reason?: string; // 'NotFound', 'AlreadyExists', 'Conflict', 'Invalid'
  status?: string; // 'Failure'
};

export type K8sResponseError = Error & {
  body?: K8sStatusBody | string;
  statusCode: number;
};

export const isK8sResponseError = (err: unknown): err is K8sResponseError =>
  err instanceof Error && isObject(err) && typeof err.statusCode === 'number';

export const statusMessageOf = (err: K8sResponseError): string =>
  isObject(err.body) && typeof err.body.message === 'string' ? err.body.message : err.message;
