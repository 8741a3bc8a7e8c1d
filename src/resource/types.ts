import type { ResourceRequest } from './request.js';

export type MaybePromise<T> = T | Promise<T>;

/**
 * What a resource method hands back to the dispatcher. `text` and `bytes`
 * are written verbatim; `structured` goes through the configured codec and
 * is the only kind that picks up the default content type.
 */
export type Payload =
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'bytes'; readonly bytes: Uint8Array }
  | { readonly kind: 'structured'; readonly value: unknown };

export type HeaderValues = string | readonly string[];

// Insertion order is kept; every value is appended to the response.
export type ResponseHeaders = Readonly<Record<string, HeaderValues>>;

export interface DispatchResult {
  readonly status: number;
  readonly payload: Payload;
  readonly headers?: ResponseHeaders;
}

export type CapabilityMethod = (request: ResourceRequest) => MaybePromise<DispatchResult>;

export interface GetCapable {
  get(request: ResourceRequest): MaybePromise<DispatchResult>;
}

export interface PostCapable {
  post(request: ResourceRequest): MaybePromise<DispatchResult>;
}

export interface PutCapable {
  put(request: ResourceRequest): MaybePromise<DispatchResult>;
}

export interface DeleteCapable {
  delete(request: ResourceRequest): MaybePromise<DispatchResult>;
}

export interface HeadCapable {
  head(request: ResourceRequest): MaybePromise<DispatchResult>;
}

export interface PatchCapable {
  patch(request: ResourceRequest): MaybePromise<DispatchResult>;
}

/** Any object; which verbs it answers is decided per request. */
export type Resource = object;

export const text = (value: string): Payload => ({ kind: 'text', text: value });

export const bytes = (value: Uint8Array): Payload => ({ kind: 'bytes', bytes: value });

export const structured = (value: unknown): Payload => ({ kind: 'structured', value });

export const respond = (status: number, payload: Payload, headers?: ResponseHeaders): DispatchResult =>
  headers === undefined ? { status, payload } : { status, payload, headers };
