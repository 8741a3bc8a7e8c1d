import type { ServerResponse } from 'http';
import type { HandlerWrapper } from '../connectors/router.js';

export interface CorsConfig {
  enabled: boolean;
  origins: Set<string>;
  allowAll: boolean;
}

export function parseCorsOrigins(list: string[]): CorsConfig {
  const origins = list.map(o => o.trim()).filter(o => o.length > 0);
  if (origins.length === 0) {
    return { enabled: false, origins: new Set(), allowAll: false };
  }
  return {
    enabled: true,
    origins: new Set(origins),
    allowAll: origins.includes('*')
  };
}

export function isOriginAllowed(origin: string | undefined, config: CorsConfig): boolean {
  if (!config.enabled || !origin) return false;
  if (config.allowAll) return true;
  return config.origins.has(origin);
}

function applyCorsHeaders(res: ServerResponse, origin: string) {
  res.setHeader('Access-Control-Allow-Origin', origin);
  res.setHeader('Access-Control-Allow-Methods', 'GET, POST, PUT, DELETE, HEAD, PATCH, OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'content-type, authorization');
  res.setHeader('Access-Control-Max-Age', '86400');
  res.setHeader('Vary', 'Origin');
}

/**
 * Adds CORS headers for allowed origins and answers their preflight
 * requests with 204. Other requests pass through untouched.
 */
export function withCors(config: CorsConfig): HandlerWrapper {
  return (next) => (req, res) => {
    const origin = req.headers.origin;
    if (isOriginAllowed(origin, config) && origin) {
      applyCorsHeaders(res, origin);
      if (req.method === 'OPTIONS') {
        res.writeHead(204).end();
        return;
      }
    }
    next(req, res);
  };
}
