import { validateHeaderName, validateHeaderValue, type IncomingMessage, type ServerResponse } from 'http';
import { describeError, EncodeError, FormParseError } from '../errors.js';
import { encodePayload, withDefaultContentType } from '../codec/encode.js';
import { Codec } from '../codec/types.js';
import { resolveCapability } from '../resource/capabilities.js';
import { ResourceRequest } from '../resource/request.js';
import type { DispatchResult, Resource, ResponseHeaders } from '../resource/types.js';
import { getRouteParams, type HttpHandler } from './router.js';

/** Read on every request, so setup-phase changes apply to routes already bound. */
export interface DispatchSettings {
  readonly parseForm: boolean;
  readonly defaultContentType: string;
  readonly codec: Codec;
  readonly maxBodyBytes: number;
}

function finish(res: ServerResponse, status: number) {
  res.statusCode = status;
  res.end();
}

function isValidStatus(status: number): boolean {
  return Number.isInteger(status) && status >= 100 && status <= 999;
}

function headerPairs(headers: ResponseHeaders): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];
  for (const [name, values] of Object.entries(headers)) {
    for (const value of typeof values === 'string' ? [values] : values) {
      validateHeaderName(name);
      validateHeaderValue(name, value);
      pairs.push([name, value]);
    }
  }
  return pairs;
}

async function dispatch(resource: Resource, settings: DispatchSettings, req: IncomingMessage, res: ServerResponse): Promise<void> {
  const request = new ResourceRequest(req, getRouteParams(req), settings.maxBodyBytes);

  if (settings.parseForm) {
    try {
      await request.parseForm();
    } catch (err) {
      if (!(err instanceof FormParseError)) throw err;
      console.warn(`[HTTP] Malformed form in ${request.method} ${request.path}: ${describeError(err.cause ?? err)}`);
      finish(res, 400);
      return;
    }
  }

  const capability = resolveCapability(resource, req.method);
  if (!capability) {
    finish(res, 405);
    return;
  }

  let result: DispatchResult;
  try {
    result = await capability(request);
  } catch (err) {
    console.error(`[HTTP] Resource failed on ${request.method} ${request.path}: ${describeError(err)}`);
    finish(res, 500);
    return;
  }

  let body: Buffer;
  let headers: ResponseHeaders | undefined = result.headers;
  try {
    const encoded = encodePayload(result.payload, settings.codec);
    body = encoded.body;
    if (encoded.structured) headers = withDefaultContentType(headers, settings.defaultContentType);
  } catch (err) {
    if (!(err instanceof EncodeError)) throw err;
    console.error(`[HTTP] ${err.message} (${request.method} ${request.path})`);
    finish(res, 500);
    return;
  }

  let pairs: Array<[string, string]>;
  try {
    pairs = headerPairs(headers ?? {});
  } catch (err) {
    console.error(`[HTTP] Invalid response header from ${request.method} ${request.path}: ${describeError(err)}`);
    finish(res, 500);
    return;
  }
  if (!isValidStatus(result.status)) {
    console.error(`[HTTP] Invalid status ${result.status} from ${request.method} ${request.path}`);
    finish(res, 500);
    return;
  }

  for (const [name, value] of pairs) res.appendHeader(name, value);
  res.statusCode = result.status;
  res.end(body);
}

/**
 * Builds the request listener for one resource: parse the form (when
 * enabled), pick the method for the request's verb, run it, encode the
 * payload and write status, headers and body once.
 *
 * Short-circuits, each with an empty body: 400 for a malformed form, 405
 * when the resource does not answer the verb, 500 when encoding fails or
 * the resource method throws.
 */
export function createDispatcher(resource: Resource, settings: DispatchSettings): HttpHandler {
  return (req, res) => {
    dispatch(resource, settings, req, res).catch((err: unknown) => {
      console.error(`[HTTP] Dispatch failed for ${req.method} ${req.url}: ${describeError(err)}`);
      if (!res.headersSent) finish(res, 500);
      else res.destroy();
    });
  };
}
