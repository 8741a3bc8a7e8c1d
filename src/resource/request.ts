import type { IncomingHttpHeaders, IncomingMessage } from 'http';
import { PayloadTooLargeError } from '../errors.js';
import { parseForm, type ParsedForm, type UploadedFile } from '../connectors/form.js';

export const DEFAULT_MAX_BODY_BYTES = 10 * 1024 * 1024;

function readLimited(req: IncomingMessage, limit: number): Promise<Buffer> {
  if (req.readableEnded) return Promise.resolve(Buffer.alloc(0));
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let total = 0;
    let overflow = false;
    req.on('data', (chunk: Buffer) => {
      total += chunk.length;
      if (total > limit) {
        // keep draining so the connection can still carry the response
        overflow = true;
        chunks.length = 0;
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => {
      if (overflow) reject(new PayloadTooLargeError(limit));
      else resolve(Buffer.concat(chunks));
    });
    req.on('error', reject);
  });
}

/**
 * The request as seen by a resource method. Wraps the Node request with the
 * router's path parameters and the parsed form, and memoizes the body so it
 * can be read both by form parsing and by the resource.
 */
export class ResourceRequest {
  readonly method: string;
  readonly path: string;
  readonly rawQuery: string;
  readonly headers: IncomingHttpHeaders;

  form: URLSearchParams | null = null;
  postForm: URLSearchParams | null = null;
  files: UploadedFile[] = [];

  private body: Promise<Buffer> | null = null;
  private parsed: Promise<ParsedForm> | null = null;

  constructor(
    readonly raw: IncomingMessage,
    readonly params: Readonly<Record<string, string>> = {},
    private readonly maxBodyBytes = DEFAULT_MAX_BODY_BYTES,
  ) {
    const url = raw.url || '/';
    const q = url.indexOf('?');
    this.method = (raw.method || 'GET').toUpperCase();
    this.path = q === -1 ? url : url.slice(0, q);
    this.rawQuery = q === -1 ? '' : url.slice(q + 1);
    this.headers = raw.headers;
  }

  header(name: string): string | undefined {
    const value = this.headers[name.toLowerCase()];
    return Array.isArray(value) ? value[0] : value;
  }

  formValue(name: string): string | undefined {
    return this.form?.get(name) ?? undefined;
  }

  readBody(): Promise<Buffer> {
    if (!this.body) this.body = readLimited(this.raw, this.maxBodyBytes);
    return this.body;
  }

  async parseForm(): Promise<URLSearchParams> {
    if (!this.parsed) {
      this.parsed = parseForm({
        method: this.method,
        headers: this.headers,
        rawQuery: this.rawQuery,
        readBody: () => this.readBody(),
      });
    }
    const { form, postForm, files } = await this.parsed;
    this.form = form;
    this.postForm = postForm;
    this.files = files;
    return form;
  }
}
