import { strict as assert } from 'assert';
import { after, before, describe, it } from 'node:test';
import { Api } from '../src/api.js';
import { msgpackCodec } from '../src/codec/msgpack.js';
import { loadConfig, toApiOptions } from '../src/config/loader.js';
import type { ResourceRequest } from '../src/resource/request.js';
import { bytes, respond, structured, text, type DispatchResult } from '../src/resource/types.js';
import { form, httpRequest, listen } from './harness.js';

class HelloResource {
  get(): DispatchResult {
    return respond(200, text('hello'));
  }
}

class FormResource {
  calls = 0;
  private record(req: ResourceRequest): DispatchResult {
    this.calls++;
    return respond(200, structured({
      form: req.form ? Array.from(req.form) : null,
      postForm: req.postForm ? Array.from(req.postForm) : null,
      params: req.params,
    }));
  }
  get(req: ResourceRequest) {
    return this.record(req);
  }
  post(req: ResourceRequest) {
    return this.record(req);
  }
}

class EveryVerb {
  private answer(verb: string): DispatchResult {
    return respond(200, text(verb), { 'X-Verb': verb });
  }
  get() { return this.answer('get'); }
  post() { return this.answer('post'); }
  put() { return this.answer('put'); }
  delete() { return this.answer('delete'); }
  head() { return this.answer('head'); }
  patch() { return this.answer('patch'); }
}

describe('dispatcher', () => {
  const api = new Api({ maxBodyBytes: 64 });
  const formResource = new FormResource();
  let port = 0;

  before(async () => {
    api.register(new HelloResource(), '/hello');
    api.register(formResource, '/form', '/form/:id');
    api.register(new EveryVerb(), '/every');
    api.register({
      get: () => respond(200, structured({ a: 1 })),
    }, '/json');
    api.register({
      get: () => respond(201, structured({ ok: true }), { 'content-type': 'application/vnd.test+json' }),
      post: () => respond(200, structured([1]), { 'Content-Type': '' }),
    }, '/explicit');
    api.register({
      get: () => respond(200, bytes(Uint8Array.from([0, 1, 2, 255]))),
    }, '/bytes');
    api.register({
      get: () => respond(200, structured({ big: 10n }), { 'X-Trace': 'abc' }),
    }, '/unencodable');
    api.register({
      get: () => respond(200, text('multi'), { 'Set-Cookie': ['a=1', 'b=2'], 'X-Multi': ['1', '2'] }),
    }, '/multi');
    api.register({
      get: async () => {
        await new Promise((r) => setTimeout(r, 5));
        return respond(202, text('later'));
      },
      post: () => {
        throw new Error('boom');
      },
      put: () => Promise.reject(new Error('rejected')),
      patch: () => respond(42, text('bad status')),
      delete: () => respond(200, text('bad header'), { 'X-Bad': 'line\nbreak' }),
    }, '/edge');
    port = await listen(api);
  });

  after(async () => {
    await api.close();
  });

  it('writes text payloads verbatim without a content type', async () => {
    const res = await httpRequest(port, { path: '/hello' });
    assert.equal(res.status, 200);
    assert.equal(res.body.toString('utf8'), 'hello');
    assert.equal(res.headers['content-type'], undefined);
  });

  it('answers unimplemented verbs with an empty 405', async () => {
    const res = await httpRequest(port, { method: 'POST', path: '/hello' });
    assert.equal(res.status, 405);
    assert.equal(res.body.length, 0);
  });

  it('answers unrecognized methods with an empty 405', async () => {
    for (const method of ['OPTIONS', 'PROPFIND']) {
      const res = await httpRequest(port, { method, path: '/every' });
      assert.equal(res.status, 405, method);
      assert.equal(res.body.length, 0);
    }
  });

  it('routes each verb to its method', async () => {
    for (const verb of ['get', 'post', 'put', 'delete', 'patch']) {
      const res = await httpRequest(port, { method: verb.toUpperCase(), path: '/every' });
      assert.equal(res.status, 200);
      assert.equal(res.headers['x-verb'], verb);
      assert.equal(res.body.toString('utf8'), verb);
    }
    const head = await httpRequest(port, { method: 'HEAD', path: '/every' });
    assert.equal(head.status, 200);
    assert.equal(head.headers['x-verb'], 'head');
    assert.equal(head.body.length, 0);
  });

  it('serializes structured payloads and adds the default content type', async () => {
    const res = await httpRequest(port, { path: '/json' });
    assert.equal(res.status, 200);
    assert.equal(res.body.toString('utf8'), '{\n  "a": 1\n}');
    assert.equal(res.headers['content-type'], 'application/json');
  });

  it('keeps an explicit content type over the default', async () => {
    const res = await httpRequest(port, { path: '/explicit' });
    assert.equal(res.status, 201);
    assert.equal(res.headers['content-type'], 'application/vnd.test+json');
    assert.deepEqual(JSON.parse(res.body.toString('utf8')), { ok: true });
  });

  it('replaces an empty explicit content type with the default', async () => {
    const res = await httpRequest(port, { method: 'POST', path: '/explicit' });
    assert.equal(res.headers['content-type'], 'application/json');
    assert.equal(res.body.toString('utf8'), '[\n  1\n]');
  });

  it('writes byte payloads exactly', async () => {
    const res = await httpRequest(port, { path: '/bytes' });
    assert.deepEqual([...res.body], [0, 1, 2, 255]);
    assert.equal(res.headers['content-type'], undefined);
  });

  it('answers encoding failures with an empty 500 and drops handler headers', async () => {
    const res = await httpRequest(port, { path: '/unencodable' });
    assert.equal(res.status, 500);
    assert.equal(res.body.length, 0);
    assert.equal(res.headers['x-trace'], undefined);
    assert.equal(res.headers['content-type'], undefined);
  });

  it('appends every header value', async () => {
    const res = await httpRequest(port, { path: '/multi' });
    assert.deepEqual(res.headers['set-cookie'], ['a=1', 'b=2']);
    assert.equal(res.headers['x-multi'], '1, 2');
  });

  it('awaits asynchronous resource methods', async () => {
    const res = await httpRequest(port, { path: '/edge' });
    assert.equal(res.status, 202);
    assert.equal(res.body.toString('utf8'), 'later');
  });

  it('answers throwing and rejecting methods with an empty 500', async () => {
    for (const method of ['POST', 'PUT']) {
      const res = await httpRequest(port, { method, path: '/edge' });
      assert.equal(res.status, 500, method);
      assert.equal(res.body.length, 0);
    }
  });

  it('answers invalid statuses and headers with an empty 500', async () => {
    const badStatus = await httpRequest(port, { method: 'PATCH', path: '/edge' });
    assert.equal(badStatus.status, 500);
    assert.equal(badStatus.body.length, 0);
    const badHeader = await httpRequest(port, { method: 'DELETE', path: '/edge' });
    assert.equal(badHeader.status, 500);
    assert.equal(badHeader.headers['x-bad'], undefined);
  });

  it('parses query and body into form and postForm', async () => {
    const res = await httpRequest(port, { method: 'POST', path: '/form/9?x=2', ...form('name=Ada+L&x=1') });
    assert.equal(res.status, 200);
    assert.deepEqual(JSON.parse(res.body.toString('utf8')), {
      form: [['name', 'Ada L'], ['x', '1'], ['x', '2']],
      postForm: [['name', 'Ada L'], ['x', '1']],
      params: { id: '9' },
    });
  });

  it('answers a malformed query with an empty 400 without calling the resource', async () => {
    const before = formResource.calls;
    const res = await httpRequest(port, { path: '/form?a=%zz' });
    assert.equal(res.status, 400);
    assert.equal(res.body.length, 0);
    assert.equal(formResource.calls, before);
  });

  it('answers a malformed form body with an empty 400', async () => {
    const before = formResource.calls;
    const res = await httpRequest(port, { method: 'POST', path: '/form', ...form('a=%') });
    assert.equal(res.status, 400);
    assert.equal(res.body.length, 0);
    assert.equal(formResource.calls, before);
  });

  it('answers a malformed content type with an empty 400', async () => {
    const res = await httpRequest(port, { method: 'POST', path: '/form', headers: { 'content-type': 'not a type' }, body: 'x' });
    assert.equal(res.status, 400);
  });

  it('answers an oversized form body with an empty 400', async () => {
    const res = await httpRequest(port, { method: 'POST', path: '/form', ...form(`a=${'x'.repeat(100)}`) });
    assert.equal(res.status, 400);
    assert.equal(res.body.length, 0);
  });

  it('checks the form before the verb', async () => {
    const res = await httpRequest(port, { method: 'PUT', path: '/hello?bad=%', ...form('a=1') });
    assert.equal(res.status, 400);
  });
});

describe('dispatcher with form parsing disabled', () => {
  const api = new Api({ parseForm: false });
  let port = 0;

  before(async () => {
    api.register({
      get: (req: ResourceRequest) => respond(200, structured({ form: req.form, raw: req.rawQuery })),
      post: async (req: ResourceRequest) => {
        const values = await req.parseForm();
        return respond(200, text(values.get('a') ?? 'none'));
      },
    }, '/raw');
    port = await listen(api);
  });

  after(async () => {
    await api.close();
  });

  it('passes malformed queries through untouched', async () => {
    const res = await httpRequest(port, { path: '/raw?a=%zz' });
    assert.equal(res.status, 200);
    assert.deepEqual(JSON.parse(res.body.toString('utf8')), { form: null, raw: 'a=%zz' });
  });

  it('lets resources parse the form on demand', async () => {
    const res = await httpRequest(port, { method: 'POST', path: '/raw', ...form('a=42') });
    assert.equal(res.body.toString('utf8'), '42');
  });
});

describe('dispatcher with another codec', () => {
  const api = new Api(toApiOptions(loadConfig({ VERBKIT_CODEC: 'msgpack' })));
  let port = 0;

  before(async () => {
    api.register({ get: () => respond(200, structured({ a: 1 })) }, '/packed');
    port = await listen(api);
  });

  after(async () => {
    await api.close();
  });

  it('encodes structured payloads with the configured codec', async () => {
    const res = await httpRequest(port, { path: '/packed' });
    assert.equal(res.headers['content-type'], 'application/msgpack');
    assert.deepEqual(msgpackCodec.decode(res.body), { a: 1 });
  });

  it('labels structured payloads with the codec media type when built directly', async () => {
    const direct = new Api({ codec: msgpackCodec });
    direct.register({ get: () => respond(200, structured([1, 2])) }, '/direct');
    const directPort = await listen(direct);
    try {
      const res = await httpRequest(directPort, { path: '/direct' });
      assert.equal(res.headers['content-type'], 'application/msgpack');
      assert.deepEqual(msgpackCodec.decode(res.body), [1, 2]);
    } finally {
      await direct.close();
    }
  });
});
