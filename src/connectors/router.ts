import type { IncomingMessage, ServerResponse } from 'http';

/** Node's request listener shape: side effects on `res`, nothing returned. */
export type HttpHandler = (req: IncomingMessage, res: ServerResponse) => void;

export type HandlerWrapper = (handler: HttpHandler) => HttpHandler;

/**
 * What the API facade needs from a router. Any matching scheme works as
 * long as it picks the same handler for the same request every time.
 */
export interface Router {
  bind(pattern: string, handler: HttpHandler): void;
  serve(req: IncomingMessage, res: ServerResponse): void;
}

const routeParams = new WeakMap<IncomingMessage, Readonly<Record<string, string>>>();

/** Path parameters captured by the router that matched `req`. */
export function getRouteParams(req: IncomingMessage): Readonly<Record<string, string>> {
  return routeParams.get(req) ?? {};
}

export function setRouteParams(req: IncomingMessage, params: Readonly<Record<string, string>>): void {
  routeParams.set(req, params);
}

type Segment =
  | { kind: 'literal'; value: string }
  | { kind: 'param'; name: string }
  | { kind: 'wildcard' };

interface Route {
  pattern: string;
  segments: Segment[];
  handler: HttpHandler;
}

// Empty segments are kept, so `/a/`, `//a` and `/a` are three different paths.
function splitPath(path: string): string[] {
  const rest = path.startsWith('/') ? path.slice(1) : path;
  return rest === '' ? [] : rest.split('/');
}

function compile(pattern: string): Segment[] {
  const parts = splitPath(pattern);
  return parts.map((part, i): Segment => {
    if (part === '*') {
      if (i !== parts.length - 1) throw new Error(`Wildcard must be the last segment: ${pattern}`);
      return { kind: 'wildcard' };
    }
    if (part.startsWith(':')) {
      if (part.length === 1) throw new Error(`Unnamed path parameter in ${pattern}`);
      return { kind: 'param', name: part.slice(1) };
    }
    return { kind: 'literal', value: part };
  });
}

function decodeSegment(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch {
    return raw;
  }
}

function match(segments: Segment[], parts: string[]): Record<string, string> | null {
  const params: Record<string, string> = {};
  for (let i = 0; i < segments.length; i++) {
    const seg = segments[i];
    if (seg.kind === 'wildcard') {
      params['*'] = parts.slice(i).map(decodeSegment).join('/');
      return params;
    }
    if (i >= parts.length) return null;
    if (seg.kind === 'literal') {
      if (seg.value !== parts[i]) return null;
    } else {
      if (parts[i] === '') return null;
      params[seg.name] = decodeSegment(parts[i]);
    }
  }
  return segments.length === parts.length ? params : null;
}

/**
 * Default segment router: literal segments, `:name` parameters and a
 * trailing `*`. Routes are tried in registration order and the first match
 * wins; anything unmatched gets an empty 404.
 *
 * Matching is strict about slashes: `/hello/` and `//hello` do not match
 * `/hello`, and a parameter never matches an empty segment.
 */
export class PathRouter implements Router {
  private routes: Route[] = [];

  bind(pattern: string, handler: HttpHandler): void {
    this.routes.push({ pattern, segments: compile(pattern), handler });
  }

  patterns(): string[] {
    return this.routes.map(r => r.pattern);
  }

  serve(req: IncomingMessage, res: ServerResponse): void {
    const url = req.url || '/';
    const q = url.indexOf('?');
    const parts = splitPath(q === -1 ? url : url.slice(0, q));
    for (const route of this.routes) {
      const params = match(route.segments, parts);
      if (params) {
        setRouteParams(req, params);
        route.handler(req, res);
        return;
      }
    }
    res.writeHead(404).end();
  }
}
