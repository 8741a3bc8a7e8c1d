import type { Api } from '../api.js';
import type { HandlerWrapper } from '../connectors/router.js';
import type { ResourceRequest } from '../resource/request.js';
import { respond, structured, text, type DispatchResult } from '../resource/types.js';

export class HealthResource {
  private readonly startedAt = Date.now();

  get(): DispatchResult {
    return respond(200, structured({ ok: true, uptimeMs: Date.now() - this.startedAt }));
  }

  head(): DispatchResult {
    return respond(200, text(''));
  }
}

/** Echoes the parsed form back; GET and POST only. */
export class EchoResource {
  get(req: ResourceRequest): DispatchResult {
    return respond(200, structured(this.describe(req)));
  }

  post(req: ResourceRequest): DispatchResult {
    return respond(200, structured({
      ...this.describe(req),
      files: req.files.map(f => ({ field: f.field, filename: f.filename, size: f.data.length })),
    }));
  }

  private describe(req: ResourceRequest) {
    const form: Record<string, string[]> = {};
    for (const key of new Set(req.form?.keys() ?? [])) {
      form[key] = req.form?.getAll(key) ?? [];
    }
    return { method: req.method, path: req.path, contentType: req.header('Content-Type') ?? null, form };
  }
}

interface Note {
  id: string;
  body: string;
  updatedAt: string;
}

/** In-memory notes keyed by the `:id` path parameter; answers every verb. */
export class NotesResource {
  private notes = new Map<string, Note>();

  get(req: ResourceRequest): DispatchResult {
    const id = req.params.id;
    if (!id) return respond(200, structured(Array.from(this.notes.values())));
    const note = this.notes.get(id);
    return note ? respond(200, structured(note)) : respond(404, text('note not found\n'));
  }

  head(req: ResourceRequest): DispatchResult {
    const id = req.params.id;
    return respond(id && this.notes.has(id) ? 200 : 404, text(''));
  }

  post(req: ResourceRequest): DispatchResult {
    const id = req.params.id;
    if (!id) return respond(400, text('missing id\n'));
    if (this.notes.has(id)) return respond(409, text('note exists\n'));
    const note = this.save(id, req.formValue('body') ?? '');
    return respond(201, structured(note), { Location: `/notes/${encodeURIComponent(id)}` });
  }

  put(req: ResourceRequest): DispatchResult {
    const id = req.params.id;
    if (!id) return respond(400, text('missing id\n'));
    const created = !this.notes.has(id);
    return respond(created ? 201 : 200, structured(this.save(id, req.formValue('body') ?? '')));
  }

  patch(req: ResourceRequest): DispatchResult {
    const id = req.params.id;
    const note = id ? this.notes.get(id) : undefined;
    if (!id || !note) return respond(404, text('note not found\n'));
    const body = req.formValue('append') ?? '';
    return respond(200, structured(this.save(id, note.body + body)));
  }

  delete(req: ResourceRequest): DispatchResult {
    const id = req.params.id;
    if (!id || !this.notes.delete(id)) return respond(404, text('note not found\n'));
    return respond(204, text(''));
  }

  private save(id: string, body: string): Note {
    const note = { id, body, updatedAt: new Date().toISOString() };
    this.notes.set(id, note);
    return note;
  }
}

export function registerDemo(api: Api, wrapper: HandlerWrapper) {
  api.registerWithWrapper(new HealthResource(), wrapper, '/health');
  api.registerWithWrapper(new EchoResource(), wrapper, '/echo');
  api.registerWithWrapper(new NotesResource(), wrapper, '/notes', '/notes/:id');
}
