import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import type { Server } from 'node:http';
import { createApp } from '../app.js';

const EML = `From: alert@secure-bank.tk
To: customer@example.com
Subject: Verify now
Content-Type: text/plain; charset=utf-8

Urgent action required: verify your account at http://secure-bank.tk/login now!
`;

async function startServer(overrides?: Parameters<typeof createApp>[0]): Promise<{ server: Server; baseUrl: string }> {
  const { app } = createApp({ modelVersion: 'test-model', lexiconPath: '', ...overrides });
  const server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, '127.0.0.1', () => resolve(s));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('server is not listening on a TCP port');
  const port = address.port;
  return { server, baseUrl: `http://127.0.0.1:${port}` };
}

function stopServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
}

describe('api', () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    ({ server, baseUrl } = await startServer());
  });

  afterAll(async () => {
    await stopServer(server);
    vi.restoreAllMocks();
  });

  const postJson = (path: string, body: unknown) =>
    fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });

  const postFile = (body: string | Uint8Array, contentType = 'message/rfc822') =>
    fetch(`${baseUrl}/api/analyze/file`, {
      method: 'POST',
      headers: { 'Content-Type': contentType },
      body,
    });

  // --- health ---

  it('reports health with the model version', async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: 'ok',
      model_version: 'test-model',
      lexicon_version: '2024.1',
    });
  });

  // --- text analysis ---

  it('analyzes a text submission', async () => {
    const res = await postJson('/api/analyze/text', {
      body: 'Dear user, please verify your account now, your account is suspended!!! click here: http://secure-login.tk/verify',
    });
    expect(res.status).toBe(200);
    const json = await res.json();
    expect(json).toMatchObject({
      verdict: 'phishing',
      model_version: 'test-model',
      metadata: { to_addresses: [] },
    });
    expect(json).toHaveProperty('insights.length', 6);
  });

  it('accepts null for optional fields', async () => {
    const res = await postJson('/api/analyze/text', { body: 'See you at the meeting.', subject: null, headers: null });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      verdict: 'legitimate',
      metadata: { subject: null, from_address: null, reply_to: null, to_addresses: [] },
    });
  });

  it('rejects a missing or empty body', async () => {
    const missing = await postJson('/api/analyze/text', { subject: 'hi' });
    expect(missing.status).toBe(400);
    expect(await missing.json()).toEqual({ error: 'body is required and must be a non-empty string' });

    const empty = await postJson('/api/analyze/text', { body: '' });
    expect(empty.status).toBe(400);
  });

  it('rejects non-string optional fields', async () => {
    const res = await postJson('/api/analyze/text', { body: 'hello', subject: 42 });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'subject and headers must be strings when provided' });
  });

  it('rejects invalid JSON', async () => {
    const res = await fetch(`${baseUrl}/api/analyze/text`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{ "body": ',
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Invalid JSON in request body' });
  });

  // --- file analysis ---

  it('analyzes an uploaded message', async () => {
    const res = await postFile(EML);
    expect(res.status).toBe(201);
    expect(await res.json()).toMatchObject({
      verdict: 'phishing',
      metadata: {
        subject: 'Verify now',
        from_address: expect.stringContaining('alert@secure-bank.tk'),
      },
      highlights: expect.arrayContaining(['The sender\'s domain is suspicious.']),
    });
  });

  it('accepts application/octet-stream uploads', async () => {
    const res = await postFile(EML, 'application/octet-stream');
    expect(res.status).toBe(201);
  });

  it('rejects unsupported content types', async () => {
    const res = await postFile(EML, 'image/png');
    expect(res.status).toBe(415);
    expect(await res.json()).toEqual({ error: 'Unsupported content type: image/png' });
  });

  it('rejects an empty upload', async () => {
    const res = await postFile('');
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Uploaded file is empty.' });
  });

  it('rejects a binary upload that is not a mail message', async () => {
    const res = await postFile(new Uint8Array([0x50, 0x4b, 0x03, 0x04, 0x00, 0x00]));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Failed to parse email message: binary content in header section' });
  });

  it('returns 404 for unknown api routes', async () => {
    const res = await fetch(`${baseUrl}/api/nope`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found' });
  });
});

describe('api upload limit', () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    ({ server, baseUrl } = await startServer({ api: { maxUploadBytes: 1024 } }));
  });

  afterAll(async () => {
    await stopServer(server);
  });

  it('rejects uploads over the configured size', async () => {
    const res = await fetch(`${baseUrl}/api/analyze/file`, {
      method: 'POST',
      headers: { 'Content-Type': 'message/rfc822' },
      body: 'Subject: big\n\n' + 'x'.repeat(2048),
    });
    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({ error: 'File exceeds the maximum allowed size of 1024 bytes.' });
  });
});
