import { Api } from './api.js';
import { registerDemo } from './backend/demo.js';
import { loadConfig, toApiOptions } from './config/loader.js';
import { describeError } from './errors.js';
import { JsonlLog } from './log/jsonl.js';
import type { HandlerWrapper } from './connectors/router.js';
import { compose } from './wrappers/compose.js';
import { parseCorsOrigins, withCors } from './wrappers/cors.js';
import { withRequestLog } from './wrappers/request-log.js';

const config = loadConfig();
const api = new Api(toApiOptions(config));

const wrappers: HandlerWrapper[] = [];
const log = config.log.path ? new JsonlLog(config.log.path) : null;
if (log) wrappers.push(withRequestLog(log));
const cors = parseCorsOrigins(config.cors.origins);
if (cors.enabled) {
  console.log(`[CORS] Enabled: ${cors.allowAll ? '*' : Array.from(cors.origins).join(', ')}`);
  wrappers.push(withCors(cors));
}

registerDemo(api, compose(...wrappers));

const shutdown = () => {
  console.log('[HTTP] Shutting down');
  api.close().then(() => log?.close()).catch((err: unknown) => {
    console.error(`[HTTP] Shutdown failed: ${describeError(err)}`);
    process.exitCode = 1;
  });
};
process.once('SIGINT', shutdown);
process.once('SIGTERM', shutdown);

try {
  await api.start(config.http.port, config.http.bind);
} catch (err) {
  console.error(`[HTTP] Server stopped: ${describeError(err)}`);
  process.exitCode = 1;
}
