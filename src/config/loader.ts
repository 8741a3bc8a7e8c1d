import * as fs from 'fs';
import * as YAML from 'yaml';
import type { ApiOptions } from '../api.js';
import { getCodecByName, listCodecs } from '../codec/registry.js';
import { ConfigError, describeError } from '../errors.js';
import { DEFAULT_MAX_BODY_BYTES } from '../resource/request.js';

export interface AppConfig {
  http: {
    port: number;
    bind: string;
    keepAliveTimeoutMs: number;
    headersTimeoutMs: number;
    requestTimeoutMs: number;
  };
  api: {
    parseForm: boolean;
    /** null follows the codec's media type. */
    defaultContentType: string | null;
    codec: string;
    maxBodyBytes: number;
  };
  log: {
    path: string | null;
  };
  cors: {
    origins: string[];
  };
}

export type Env = Record<string, string | undefined>;

export function defaultConfig(): AppConfig {
  return {
    http: {
      port: 9087,
      bind: '127.0.0.1',
      keepAliveTimeoutMs: 65000,
      headersTimeoutMs: 60000,
      requestTimeoutMs: 300000,
    },
    api: {
      parseForm: true,
      defaultContentType: null,
      codec: 'json',
      maxBodyBytes: DEFAULT_MAX_BODY_BYTES,
    },
    log: { path: null },
    cors: { origins: [] },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(doc: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = doc[key];
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) throw new ConfigError(`Config section ${key} must be a mapping`);
  return value;
}

function intField(obj: Record<string, unknown>, key: string, where: string, fallback: number): number {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${where}.${key} must be a non-negative integer`);
  }
  return value;
}

function boolField(obj: Record<string, unknown>, key: string, where: string, fallback: boolean): boolean {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') throw new ConfigError(`${where}.${key} must be a boolean`);
  return value;
}

function stringField(obj: Record<string, unknown>, key: string, where: string, fallback: string): string {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'string') throw new ConfigError(`${where}.${key} must be a string`);
  return value;
}

function nullableString(obj: Record<string, unknown>, key: string, where: string, fallback: string | null): string | null {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (value !== null && typeof value !== 'string') throw new ConfigError(`${where}.${key} must be a string`);
  return value;
}

function stringList(obj: Record<string, unknown>, key: string, where: string, fallback: string[]): string[] {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new ConfigError(`${where}.${key} must be a list of strings`);
  }
  return value;
}

/** Parses a YAML config document over the defaults. Every key is optional. */
export function parseConfigFile(content: string, base: AppConfig = defaultConfig()): AppConfig {
  let doc: unknown;
  try {
    doc = YAML.parse(content);
  } catch (err) {
    throw new ConfigError(`Invalid YAML: ${describeError(err)}`);
  }
  if (doc === null || doc === undefined) return base;
  if (!isRecord(doc)) throw new ConfigError('Config root must be a mapping');

  const http = section(doc, 'http');
  const api = section(doc, 'api');
  const log = section(doc, 'log');
  const cors = section(doc, 'cors');

  return {
    http: {
      port: intField(http, 'port', 'http', base.http.port),
      bind: stringField(http, 'bind', 'http', base.http.bind),
      keepAliveTimeoutMs: intField(http, 'keepAliveTimeoutMs', 'http', base.http.keepAliveTimeoutMs),
      headersTimeoutMs: intField(http, 'headersTimeoutMs', 'http', base.http.headersTimeoutMs),
      requestTimeoutMs: intField(http, 'requestTimeoutMs', 'http', base.http.requestTimeoutMs),
    },
    api: {
      parseForm: boolField(api, 'parseForm', 'api', base.api.parseForm),
      defaultContentType: nullableString(api, 'defaultContentType', 'api', base.api.defaultContentType),
      codec: stringField(api, 'codec', 'api', base.api.codec),
      maxBodyBytes: intField(api, 'maxBodyBytes', 'api', base.api.maxBodyBytes),
    },
    log: { path: nullableString(log, 'path', 'log', base.log.path) },
    cors: { origins: stringList(cors, 'origins', 'cors', base.cors.origins) },
  };
}

function envInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) throw new ConfigError(`${name} must be a non-negative integer, got ${raw}`);
  return value;
}

function envBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = raw.trim().toLowerCase();
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  throw new ConfigError(`${name} must be true or false, got ${raw}`);
}

/**
 * Builds the process configuration: defaults, then the YAML file named by
 * VERBKIT_CONFIG, then VERBKIT_* environment overrides.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  let config = defaultConfig();

  const file = env.VERBKIT_CONFIG;
  if (file) {
    let content: string;
    try {
      content = fs.readFileSync(file, 'utf8');
    } catch (err) {
      throw new ConfigError(`Cannot read config file ${file}: ${describeError(err)}`);
    }
    config = parseConfigFile(content, config);
    console.log(`[Config] Loaded ${file}`);
  }

  const contentType = env.VERBKIT_DEFAULT_CONTENT_TYPE;
  const logPath = env.VERBKIT_HTTP_LOG;
  const origins = env.VERBKIT_CORS_ORIGINS;

  config = {
    http: {
      port: envInt(env, 'VERBKIT_HTTP_PORT', config.http.port),
      bind: env.VERBKIT_BIND || config.http.bind,
      keepAliveTimeoutMs: envInt(env, 'VERBKIT_KEEPALIVE_TIMEOUT_MS', config.http.keepAliveTimeoutMs),
      headersTimeoutMs: envInt(env, 'VERBKIT_HEADERS_TIMEOUT_MS', config.http.headersTimeoutMs),
      requestTimeoutMs: envInt(env, 'VERBKIT_REQUEST_TIMEOUT_MS', config.http.requestTimeoutMs),
    },
    api: {
      parseForm: envBool(env, 'VERBKIT_PARSE_FORM', config.api.parseForm),
      // an empty value is meaningful here: it disables the default
      defaultContentType: contentType === undefined ? config.api.defaultContentType : contentType.trim(),
      codec: env.VERBKIT_CODEC?.trim() || config.api.codec,
      maxBodyBytes: envInt(env, 'VERBKIT_MAX_BODY', config.api.maxBodyBytes),
    },
    log: { path: logPath ? logPath : config.log.path },
    cors: { origins: origins === undefined ? config.cors.origins : origins.split(',').map(o => o.trim()).filter(o => o.length > 0) },
  };

  if (config.http.port > 65535) throw new ConfigError(`Port out of range: ${config.http.port}`);
  if (!getCodecByName(config.api.codec)) {
    const known = listCodecs().map(c => c.name).join(', ');
    throw new ConfigError(`Unknown codec ${config.api.codec} (available: ${known})`);
  }
  return config;
}

export function toApiOptions(config: AppConfig): ApiOptions {
  const codec = getCodecByName(config.api.codec);
  if (!codec) throw new ConfigError(`Unknown codec ${config.api.codec}`);
  return {
    parseForm: config.api.parseForm,
    defaultContentType: config.api.defaultContentType ?? codec.contentTypes[0],
    codec,
    maxBodyBytes: config.api.maxBodyBytes,
    timeouts: {
      keepAliveTimeoutMs: config.http.keepAliveTimeoutMs,
      headersTimeoutMs: config.http.headersTimeoutMs,
      requestTimeoutMs: config.http.requestTimeoutMs,
    },
  };
}
