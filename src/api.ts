import * as http from 'http';
import type { AddressInfo } from 'net';
import { NoResourceError } from './errors.js';
import { jsonCodec } from './codec/json.js';
import { Codec } from './codec/types.js';
import { createDispatcher } from './connectors/dispatch.js';
import { PathRouter, type HandlerWrapper, type HttpHandler, type Router } from './connectors/router.js';
import { supportedVerbs } from './resource/capabilities.js';
import { DEFAULT_MAX_BODY_BYTES } from './resource/request.js';
import type { Resource } from './resource/types.js';
import { WriteOnce } from './util/write-once.js';

export interface ServerTimeouts {
  keepAliveTimeoutMs?: number;
  headersTimeoutMs?: number;
  requestTimeoutMs?: number;
}

export interface ApiOptions {
  /** Installed up front; otherwise a PathRouter is created on first use. */
  router?: Router;
  /** Parse query and form bodies before dispatch. Default true. */
  parseForm?: boolean;
  /**
   * Set on structured responses without a Content-Type. Empty disables.
   * Defaults to the codec's first media type.
   */
  defaultContentType?: string;
  /** Serializer for structured payloads. Default JSON. */
  codec?: Codec;
  maxBodyBytes?: number;
  timeouts?: ServerTimeouts;
}

interface MutableSettings {
  parseForm: boolean;
  defaultContentType: string;
  codec: Codec;
  maxBodyBytes: number;
}

/**
 * Routes requests to the verb methods of registered resources and encodes
 * what they return. Each instance owns its router, settings and listener,
 * so several APIs can serve on separate ports.
 */
export class Api {
  private readonly routerSlot = new WriteOnce<Router>('router');
  private readonly settings: MutableSettings;
  private readonly timeouts: ServerTimeouts;
  private server: http.Server | null = null;

  constructor(options: ApiOptions = {}) {
    const codec = options.codec ?? jsonCodec;
    this.settings = {
      parseForm: options.parseForm ?? true,
      defaultContentType: options.defaultContentType ?? codec.contentTypes[0],
      codec,
      maxBodyBytes: options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES,
    };
    this.timeouts = options.timeouts ?? {};
    if (options.router) this.routerSlot.set(options.router);
  }

  /** The router in use, creating the default one on first call. */
  router(): Router {
    return this.routerSlot.getOrInit(() => new PathRouter());
  }

  /** Throws AlreadyInitializedError once a router exists, lazily created or not. */
  setRouter(router: Router): void {
    this.routerSlot.set(router);
  }

  setDefaultContentType(contentType: string): void {
    this.settings.defaultContentType = contentType;
  }

  setDefaultParseForm(parseForm: boolean): void {
    this.settings.parseForm = parseForm;
  }

  register(resource: Resource, ...paths: string[]): void {
    this.bindAll(resource, paths, handler => handler);
  }

  /** Like `register`, but the dispatcher is passed through `wrapper` before binding. */
  registerWithWrapper(resource: Resource, wrapper: HandlerWrapper, ...paths: string[]): void {
    this.bindAll(resource, paths, wrapper);
  }

  private bindAll(resource: Resource, paths: string[], wrapper: HandlerWrapper) {
    for (const path of paths) {
      this.router().bind(path, wrapper(createDispatcher(resource, this.settings)));
      console.log(`[API] ${path} -> ${supportedVerbs(resource).join(', ') || '(no verbs)'}`);
    }
  }

  /** Request listener serving through the router. */
  handler(): HttpHandler {
    const router = this.routerSlot.get();
    if (!router) throw new NoResourceError();
    return (req, res) => router.serve(req, res);
  }

  /** Binds the listener and resolves once it accepts connections. */
  listen(port: number, host?: string): Promise<http.Server> {
    let handler: HttpHandler;
    try {
      handler = this.handler();
    } catch (err) {
      return Promise.reject(err);
    }
    if (this.server) {
      return Promise.reject(new Error('API is already listening'));
    }

    const server = http.createServer(handler);
    if (this.timeouts.keepAliveTimeoutMs !== undefined) server.keepAliveTimeout = this.timeouts.keepAliveTimeoutMs;
    if (this.timeouts.headersTimeoutMs !== undefined) server.headersTimeout = this.timeouts.headersTimeoutMs;
    if (this.timeouts.requestTimeoutMs !== undefined) server.requestTimeout = this.timeouts.requestTimeoutMs;
    this.server = server;

    return new Promise((resolve, reject) => {
      const onError = (err: Error) => {
        this.server = null;
        reject(err);
      };
      server.once('error', onError);
      server.listen(port, host, () => {
        server.off('error', onError);
        const addr = server.address();
        const where = typeof addr === 'object' && addr ? `${addr.address}:${addr.port}` : String(addr);
        console.log(`[HTTP] Listening on ${where}`);
        resolve(server);
      });
    });
  }

  /**
   * Serves on `port` until the listener closes (resolves) or fails
   * (rejects). Rejects with NoResourceError, without opening a socket, when
   * nothing was registered and no router was set.
   */
  async start(port: number, host?: string): Promise<void> {
    const server = await this.listen(port, host);
    await new Promise<void>((resolve, reject) => {
      server.once('close', () => resolve());
      server.once('error', reject);
    });
  }

  address(): AddressInfo | null {
    const addr = this.server?.address();
    return typeof addr === 'object' && addr ? addr : null;
  }

  close(): Promise<void> {
    const server = this.server;
    if (!server) return Promise.resolve();
    this.server = null;
    return new Promise((resolve, reject) => {
      server.close(err => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
  }
}
