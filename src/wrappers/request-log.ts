import type { HandlerWrapper } from '../connectors/router.js';
import type { JsonlLog } from '../log/jsonl.js';

/**
 * Writes one `http_request_complete` entry per response once it finishes.
 * `bytes` is the declared request body size.
 */
export function withRequestLog(log: JsonlLog): HandlerWrapper {
  return (next) => (req, res) => {
    const started = process.hrtime.bigint();
    const url = req.url || '/';
    const q = url.indexOf('?');
    res.on('finish', () => {
      const durNs = Number(process.hrtime.bigint() - started);
      const length = Number(req.headers['content-length']);
      log.write({
        ts: new Date().toISOString(),
        event: 'http_request_complete',
        ip: req.socket.remoteAddress || 'unknown',
        method: req.method,
        path: q === -1 ? url : url.slice(0, q),
        status: res.statusCode,
        durMs: Math.round(durNs / 1e6),
        bytes: Number.isFinite(length) ? length : undefined,
        error: res.statusCode >= 400 ? `http_${res.statusCode}` : undefined,
      });
    });
    next(req, res);
  };
}
