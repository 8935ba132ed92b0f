import assert from 'node:assert/strict';
import { mkdtemp, readdir, rm } from 'node:fs/promises';
import type { Server } from 'node:http';
import os from 'node:os';
import path from 'node:path';
import { after, before, test } from 'node:test';

import { createApp } from '../app';
import { loadConfig } from '../config';
import { FakeBackend, type FakeScript } from '../testing/fake-backend';

let workspace = '';

before(async () => {
  workspace = await mkdtemp(path.join(os.tmpdir(), 'fax-routes-test-'));
});

after(async () => {
  await rm(workspace, { recursive: true, force: true });
});

interface Gateway {
  url: string;
  backend: FakeBackend;
  uploadFolder: string;
}

async function withGateway(
  script: FakeScript,
  env: NodeJS.ProcessEnv,
  run: (gateway: Gateway) => Promise<void>,
): Promise<void> {
  const uploadFolder = await mkdtemp(path.join(workspace, 'uploads-'));
  const backend = new FakeBackend(script);
  const config = loadConfig({ HYLAFAX_HOST: 'fax.test', HYLAFAX_USER: 'gateway', UPLOAD_FOLDER: uploadFolder, ...env });
  const app = createApp({ backend, config });
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const address = server.address();
  if (!address || typeof address === 'string') throw new Error('Gateway is not listening');
  try {
    await run({ url: `http://127.0.0.1:${address.port}`, backend, uploadFolder });
  } finally {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
}

function faxForm(fields: { files?: Array<[string, string]>; destinations?: string; options?: string }): FormData {
  const form = new FormData();
  for (const [name, content] of fields.files ?? []) {
    form.append('files', new Blob([content], { type: 'application/octet-stream' }), name);
  }
  if (fields.destinations !== undefined) form.append('destinations', fields.destinations);
  if (fields.options !== undefined) form.append('options', fields.options);
  return form;
}

async function call(url: string, init?: RequestInit): Promise<{ status: number; body: unknown }> {
  const response = await fetch(url, init);
  return { status: response.status, body: await response.json() };
}

async function stagedFilesSettle(directory: string): Promise<string[]> {
  for (let attempt = 0; attempt < 50; attempt++) {
    const entries = await readdir(directory);
    if (entries.length === 0) return entries;
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
  return readdir(directory);
}

async function until(condition: () => boolean): Promise<void> {
  for (let attempt = 0; attempt < 200; attempt++) {
    if (condition()) return;
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
  throw new Error('Condition was not met in time');
}

const ONE_PDF: Array<[string, string]> = [['a.pdf', '%PDF-1.4 test document']];

test('health reports a reachable fax server', async () => {
  await withGateway({}, {}, async ({ url, backend }) => {
    assert.deepEqual(await call(`${url}/api/health`), {
      status: 200,
      body: { success: true, message: 'Fax server is reachable', data: { status: 'healthy' } },
    });
    assert.deepEqual(backend.hosts, ['fax.test']);
    assert.equal(backend.count('login'), 0);
  });
});

test('health reports an unreachable fax server as unavailable', async () => {
  await withGateway({ connect: { ok: false, message: 'Connection refused' } }, {}, async ({ url }) => {
    assert.deepEqual(await call(`${url}/api/health`), {
      status: 503,
      body: {
        success: false,
        message: 'Cannot connect to fax server: Connection refused',
        data: { status: 'unhealthy' },
      },
    });
  });
});

test('send submits the staged documents and cleans them up', async () => {
  const script: FakeScript = { submit: { ok: true, jobId: '42', groupId: '42', totalPages: 3 } };
  await withGateway(script, {}, async ({ url, backend, uploadFolder }) => {
    const result = await call(`${url}/api/fax/send`, {
      method: 'POST',
      body: faxForm({ files: ONE_PDF, destinations: '["+15551234567"]', options: '{"maxDials":"5"}' }),
    });
    assert.deepEqual(result, {
      status: 200,
      body: {
        success: true,
        message: 'Fax submitted successfully',
        data: { job_id: '42', group_id: '', total_pages: 3 },
      },
    });

    const submitted = backend.calls.find((entry) => entry.method === 'submitJob');
    assert.ok(submitted && submitted.method === 'submitJob');
    assert.equal(submitted.files.length, 1);
    assert.equal(path.dirname(submitted.files[0] ?? ''), uploadFolder);
    assert.deepEqual(submitted.destinations, ['+15551234567']);
    assert.equal(submitted.options.maxDials, 5);
    assert.deepEqual(backend.calls[1], { method: 'login', username: 'gateway' });
    assert.deepEqual(await stagedFilesSettle(uploadFolder), []);
  });
});

test('send skips files with disallowed extensions', async () => {
  await withGateway({}, {}, async ({ url, backend }) => {
    await call(`${url}/api/fax/send`, {
      method: 'POST',
      body: faxForm({ files: [['setup.exe', 'MZ'], ['cover.txt', 'hello']], destinations: '["5551000"]' }),
    });
    const submitted = backend.calls.find((entry) => entry.method === 'submitJob');
    assert.ok(submitted && submitted.method === 'submitJob');
    assert.equal(submitted.files.length, 1);
    assert.match(submitted.files[0] ?? '', /_cover\.txt$/);
  });
});

test('send rejects requests without files', async () => {
  await withGateway({}, {}, async ({ url, backend }) => {
    assert.deepEqual(
      await call(`${url}/api/fax/send`, { method: 'POST', body: faxForm({ destinations: '["5551000"]' }) }),
      { status: 400, body: { success: false, message: 'No files provided', data: {} } },
    );
    assert.deepEqual(backend.methods, []);
  });
});

test('send rejects uploads with no permitted document', async () => {
  await withGateway({}, {}, async ({ url }) => {
    const result = await call(`${url}/api/fax/send`, {
      method: 'POST',
      body: faxForm({ files: [['setup.exe', 'MZ']], destinations: '["5551000"]' }),
    });
    assert.deepEqual(result, { status: 400, body: { success: false, message: 'No valid files uploaded', data: {} } });
  });
});

test('send validates destinations and options', async () => {
  await withGateway({}, {}, async ({ url, backend }) => {
    const post = (destinations: string, options?: string) =>
      call(`${url}/api/fax/send`, { method: 'POST', body: faxForm({ files: ONE_PDF, destinations, options }) });

    assert.deepEqual((await post('not json')).body, {
      success: false,
      message: 'Invalid destinations format',
      data: {},
    });
    assert.deepEqual((await post('[42]')).body, { success: false, message: 'Invalid destinations format', data: {} });
    assert.deepEqual((await post('[]')).body, { success: false, message: 'No destinations specified', data: {} });
    assert.deepEqual((await post('["5551000"]', '[1]')).body, {
      success: false,
      message: 'Invalid options format',
      data: {},
    });
    assert.equal(backend.count('connect'), 0);
  });
});

test('send rejects bodies over the size limit', async () => {
  await withGateway({}, { MAX_CONTENT_LENGTH: '2048' }, async ({ url, backend }) => {
    const result = await call(`${url}/api/fax/send`, {
      method: 'POST',
      body: faxForm({ files: [['big.pdf', 'x'.repeat(4096)]], destinations: '["5551000"]' }),
    });
    assert.deepEqual(result, { status: 413, body: { success: false, message: 'File too large', data: {} } });
    assert.equal(backend.count('submitJob'), 0);
  });
});

test('send reports an unreachable fax server and still cleans up', async () => {
  await withGateway({ connect: { ok: false, message: 'Connection refused' } }, {}, async ({ url, uploadFolder }) => {
    const result = await call(`${url}/api/fax/send`, {
      method: 'POST',
      body: faxForm({ files: ONE_PDF, destinations: '["5551000"]' }),
    });
    assert.deepEqual(result, {
      status: 503,
      body: { success: false, message: 'Connection failed: Connection refused', data: {} },
    });
    assert.deepEqual(await stagedFilesSettle(uploadFolder), []);
  });
});

test('send relays a backend rejection', async () => {
  await withGateway({ submit: { ok: false, message: 'Document type not permitted' } }, {}, async ({ url }) => {
    const result = await call(`${url}/api/fax/send`, {
      method: 'POST',
      body: faxForm({ files: ONE_PDF, destinations: '["5551000"]' }),
    });
    assert.deepEqual(result, {
      status: 400,
      body: { success: false, message: 'Document type not permitted', data: {} },
    });
  });
});

test('send is rate limited', async () => {
  await withGateway({}, { SEND_RATE_LIMIT: '1' }, async ({ url }) => {
    const post = () => call(`${url}/api/fax/send`, { method: 'POST', body: faxForm({ destinations: '[]' }) });
    assert.equal((await post()).status, 400);
    assert.deepEqual(await post(), { status: 429, body: { success: false, message: 'Too many requests', data: {} } });
  });
});

test('status lists the send queue by default', async () => {
  await withGateway({}, {}, async ({ url, backend }) => {
    assert.deepEqual(await call(`${url}/api/fax/status`), {
      status: 200,
      body: {
        success: true,
        message: 'Retrieved 0 jobs from send queue',
        data: { queue: 'send', jobs: [], count: 0 },
      },
    });
    assert.deepEqual(backend.calls.find((entry) => entry.method === 'queryJobs'), {
      method: 'queryJobs',
      queue: 'send',
      maxCount: 1000,
    });
  });
});

test('status renders records in wire form', async () => {
  const script: FakeScript = {
    query: () => ({ ok: true, jobs: [{ fileName: 'fax00001.tif', pages: '2', sender: 'Acme Corp' }] }),
  };
  await withGateway(script, { QUERY_MAX_JOBS: '10' }, async ({ url, backend }) => {
    assert.deepEqual(await call(`${url}/api/fax/status?queue=recv`), {
      status: 200,
      body: {
        success: true,
        message: 'Retrieved 1 jobs from received queue',
        data: {
          queue: 'received',
          count: 1,
          jobs: [
            {
              job_id: '',
              state: '',
              pages: '2',
              dials: '',
              tts: '',
              sender: 'Acme Corp',
              number: '',
              modem: '',
              tag: '',
              status: '',
              file_name: 'fax00001.tif',
              received: '',
            },
          ],
        },
      },
    });
    assert.equal(backend.calls.some((entry) => entry.method === 'queryJobs' && entry.maxCount === 10), true);
  });
});

test('status rejects unknown queues', async () => {
  await withGateway({}, {}, async ({ url, backend }) => {
    assert.deepEqual(await call(`${url}/api/fax/status?queue=outbox`), {
      status: 400,
      body: { success: false, message: 'Invalid queue type', data: {} },
    });
    assert.deepEqual(backend.methods, []);
  });
});

test('status reports failed queries and failed logins as unavailable', async () => {
  await withGateway({ query: () => ({ ok: false, message: 'LIST command failed' }) }, {}, async ({ url }) => {
    assert.deepEqual(await call(`${url}/api/fax/status?queue=done`), {
      status: 503,
      body: { success: false, message: 'Query failed: LIST command failed', data: {} },
    });
  });
  await withGateway({ login: { ok: false, message: 'Login incorrect.' } }, {}, async ({ url }) => {
    assert.deepEqual(await call(`${url}/api/fax/status`), {
      status: 503,
      body: { success: false, message: 'Login failed: Login incorrect.', data: {} },
    });
  });
});

test('job lookup finds a job and names its queue', async () => {
  const script: FakeScript = {
    query: (queue) => ({ ok: true, jobs: queue === 'done' ? [{ jobId: '42', state: 'D', number: '5551000' }] : [] }),
  };
  await withGateway(script, {}, async ({ url }) => {
    assert.deepEqual(await call(`${url}/api/fax/job/42`), {
      status: 200,
      body: {
        success: true,
        message: 'Job found',
        data: {
          job_id: '42',
          state: 'D',
          pages: '',
          dials: '',
          tts: '',
          sender: '',
          number: '5551000',
          modem: '',
          tag: '',
          status: '',
          file_name: '',
          received: '',
          queue: 'done',
        },
      },
    });
  });
});

test('job lookup reports a missing job', async () => {
  await withGateway({}, {}, async ({ url, backend }) => {
    assert.deepEqual(await call(`${url}/api/fax/job/99`), {
      status: 404,
      body: { success: false, message: 'Job not found', data: {} },
    });
    assert.equal(backend.count('queryJobs'), 3);
  });
});

test('job control actions report success per action', async () => {
  await withGateway({}, {}, async ({ url, backend }) => {
    const expected = [
      ['kill', 'Job killed successfully', 'killJob'],
      ['suspend', 'Job suspended successfully', 'suspendJob'],
      ['resume', 'Job resumed successfully', 'resumeJob'],
      ['wait', 'Job completed successfully', 'waitJob'],
    ] as const;
    for (const [action, message, method] of expected) {
      assert.deepEqual(await call(`${url}/api/fax/job/42/${action}`, { method: 'POST' }), {
        status: 200,
        body: { success: true, message, data: { job_id: '42' } },
      });
      assert.deepEqual(backend.calls.at(-3), { method, jobId: '42' });
    }
  });
});

test('job control relays the backend refusal', async () => {
  await withGateway({ control: { ok: false, message: 'job not found' } }, {}, async ({ url }) => {
    assert.deepEqual(await call(`${url}/api/fax/job/42/kill`, { method: 'POST' }), {
      status: 400,
      body: { success: false, message: 'job not found', data: {} },
    });
  });
});

test('a client that gives up on a wait abandons the backend session', async () => {
  await withGateway({ blockWait: true }, {}, async ({ url, backend }) => {
    const controller = new AbortController();
    const pending = fetch(`${url}/api/fax/job/42/wait`, { method: 'POST', signal: controller.signal });
    await until(() => backend.count('waitJob') === 1);
    controller.abort();
    await assert.rejects(pending);
    await until(() => backend.count('destroy') === 1);
    assert.equal(backend.count('disconnect'), 0);
  });
});

test('unexpected failures answer 500 without their detail', async () => {
  await withGateway({ connectError: 'backend exploded: secret detail' }, {}, async ({ url, backend }) => {
    assert.deepEqual(await call(`${url}/api/fax/status`), {
      status: 500,
      body: { success: false, message: 'Internal server error', data: {} },
    });
    assert.equal(backend.count('destroy'), 1);
  });
});

test('unknown routes answer with the envelope', async () => {
  await withGateway({}, {}, async ({ url }) => {
    assert.deepEqual(await call(`${url}/api/fax/nowhere`), {
      status: 404,
      body: { success: false, message: 'Not found', data: {} },
    });
  });
});
