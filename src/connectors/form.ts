import busboy from 'busboy';
import type { IncomingHttpHeaders } from 'http';
import { FormParseError } from '../errors.js';

export interface UploadedFile {
  field: string;
  filename: string;
  mimeType: string;
  encoding: string;
  data: Buffer;
}

export interface ParsedForm {
  /** Body values first, then query values. */
  form: URLSearchParams;
  /** Body values only. */
  postForm: URLSearchParams;
  files: UploadedFile[];
}

export interface FormSource {
  method: string;
  headers: IncomingHttpHeaders;
  rawQuery: string;
  readBody(): Promise<Buffer>;
}

export interface MediaType {
  type: string;
  params: Record<string, string>;
}

const BODY_METHODS = new Set(['POST', 'PUT', 'PATCH']);
const TOKEN = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;
const BAD_ESCAPE = /%(?![0-9A-Fa-f]{2})/;

export function parseMediaType(header: string): MediaType {
  const [head, ...rest] = header.split(';');
  const type = head.trim().toLowerCase();
  const [main, sub, ...extra] = type.split('/');
  if (!TOKEN.test(main) || extra.length > 0 || (sub !== undefined && !TOKEN.test(sub))) {
    throw new FormParseError(`Malformed media type: ${header}`);
  }
  const params: Record<string, string> = {};
  for (const part of rest) {
    const trimmed = part.trim();
    if (!trimmed) continue;
    const eq = trimmed.indexOf('=');
    const key = eq > 0 ? trimmed.slice(0, eq).trim().toLowerCase() : '';
    let value = eq > 0 ? trimmed.slice(eq + 1).trim() : '';
    if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
      value = value.slice(1, -1);
    } else if (!TOKEN.test(value)) {
      throw new FormParseError(`Malformed media type parameter: ${trimmed}`);
    }
    if (!TOKEN.test(key)) throw new FormParseError(`Malformed media type parameter: ${trimmed}`);
    params[key] = value;
  }
  return { type, params };
}

function unescapeComponent(raw: string): string {
  if (BAD_ESCAPE.test(raw)) throw new FormParseError(`Invalid percent escape in ${JSON.stringify(raw)}`);
  try {
    return decodeURIComponent(raw.replace(/\+/g, ' '));
  } catch (err) {
    throw new FormParseError(`Invalid encoded text in ${JSON.stringify(raw)}`, { cause: err });
  }
}

/**
 * Strict application/x-www-form-urlencoded parser. Unlike URLSearchParams it
 * rejects bad percent escapes and `;` separators instead of passing them
 * through.
 */
export function parseUrlEncoded(raw: string, into: URLSearchParams = new URLSearchParams()): URLSearchParams {
  for (const pair of raw.split('&')) {
    if (!pair) continue;
    if (pair.includes(';')) throw new FormParseError('Invalid semicolon separator in form data');
    const eq = pair.indexOf('=');
    const key = eq === -1 ? pair : pair.slice(0, eq);
    const value = eq === -1 ? '' : pair.slice(eq + 1);
    into.append(unescapeComponent(key), unescapeComponent(value));
  }
  return into;
}

function parseMultipart(headers: IncomingHttpHeaders, body: Buffer, postForm: URLSearchParams, files: UploadedFile[]): Promise<void> {
  return new Promise((resolve, reject) => {
    let bb: busboy.Busboy;
    try {
      bb = busboy({ headers });
    } catch (err) {
      reject(new FormParseError('Malformed multipart content type', { cause: err }));
      return;
    }
    bb.on('field', (name, value) => {
      postForm.append(name, value);
    });
    bb.on('file', (field, stream, info) => {
      const chunks: Buffer[] = [];
      stream.on('data', (chunk: Buffer) => chunks.push(chunk));
      stream.on('end', () => {
        files.push({
          field,
          filename: info.filename,
          mimeType: info.mimeType,
          encoding: info.encoding,
          data: Buffer.concat(chunks),
        });
      });
    });
    bb.on('close', () => resolve());
    bb.on('error', (err: unknown) => reject(new FormParseError('Malformed multipart body', { cause: err })));
    bb.end(body);
  });
}

async function readFormBody(source: FormSource): Promise<Buffer> {
  try {
    return await source.readBody();
  } catch (err) {
    throw new FormParseError('Failed to read form body', { cause: err });
  }
}

/**
 * Parses the query string and, for POST, PUT and PATCH, a urlencoded or
 * multipart body. A missing content type means the body is left alone.
 */
export async function parseForm(source: FormSource): Promise<ParsedForm> {
  const postForm = new URLSearchParams();
  const files: UploadedFile[] = [];

  const contentType = source.headers['content-type'];
  if (BODY_METHODS.has(source.method) && contentType) {
    const { type } = parseMediaType(contentType);
    if (type === 'application/x-www-form-urlencoded') {
      const body = await readFormBody(source);
      parseUrlEncoded(body.toString('utf8'), postForm);
    } else if (type === 'multipart/form-data') {
      const body = await readFormBody(source);
      await parseMultipart(source.headers, body, postForm, files);
    }
  }

  const query = parseUrlEncoded(source.rawQuery);
  const form = new URLSearchParams(postForm);
  for (const [key, value] of query) form.append(key, value);
  return { form, postForm, files };
}
