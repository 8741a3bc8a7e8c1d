import type {
  CapabilityMethod,
  DeleteCapable,
  GetCapable,
  HeadCapable,
  PatchCapable,
  PostCapable,
  PutCapable,
} from './types.js';

export const VERBS = ['GET', 'POST', 'PUT', 'DELETE', 'HEAD', 'PATCH'] as const;
export type Verb = (typeof VERBS)[number];

export function isVerb(method: string | undefined): method is Verb {
  return VERBS.some(v => v === method);
}

export function isGetCapable(resource: unknown): resource is GetCapable {
  return typeof resource === 'object' && resource !== null && 'get' in resource && typeof resource.get === 'function';
}

export function isPostCapable(resource: unknown): resource is PostCapable {
  return typeof resource === 'object' && resource !== null && 'post' in resource && typeof resource.post === 'function';
}

export function isPutCapable(resource: unknown): resource is PutCapable {
  return typeof resource === 'object' && resource !== null && 'put' in resource && typeof resource.put === 'function';
}

export function isDeleteCapable(resource: unknown): resource is DeleteCapable {
  return typeof resource === 'object' && resource !== null && 'delete' in resource && typeof resource.delete === 'function';
}

export function isHeadCapable(resource: unknown): resource is HeadCapable {
  return typeof resource === 'object' && resource !== null && 'head' in resource && typeof resource.head === 'function';
}

export function isPatchCapable(resource: unknown): resource is PatchCapable {
  return typeof resource === 'object' && resource !== null && 'patch' in resource && typeof resource.patch === 'function';
}

/**
 * Returns the resource method answering `method`, bound to the resource, or
 * undefined when the verb is unknown or the resource does not implement it.
 */
export function resolveCapability(resource: unknown, method: string | undefined): CapabilityMethod | undefined {
  if (!isVerb(method)) return undefined;
  switch (method) {
    case 'GET':
      return isGetCapable(resource) ? resource.get.bind(resource) : undefined;
    case 'POST':
      return isPostCapable(resource) ? resource.post.bind(resource) : undefined;
    case 'PUT':
      return isPutCapable(resource) ? resource.put.bind(resource) : undefined;
    case 'DELETE':
      return isDeleteCapable(resource) ? resource.delete.bind(resource) : undefined;
    case 'HEAD':
      return isHeadCapable(resource) ? resource.head.bind(resource) : undefined;
    case 'PATCH':
      return isPatchCapable(resource) ? resource.patch.bind(resource) : undefined;
  }
}

export function supportedVerbs(resource: unknown): Verb[] {
  return VERBS.filter(verb => resolveCapability(resource, verb) !== undefined);
}
