import { Server } from 'http';
import { createApp } from '../app';
import { DocumentQAService } from '../services/DocumentQAService';
import { POLICY_TEXT, createHarness, member } from './helpers/fakes';

interface RunningApp {
  baseUrl: string;
  server: Server;
}

async function start(qaService: DocumentQAService | null): Promise<RunningApp> {
  const app = createApp({ qaService, maxFileSize: 1024 * 1024, corsOrigins: [] });
  const server = app.listen(0);
  await new Promise<void>(resolve => server.once('listening', resolve));
  const address = server.address();
  if (typeof address !== 'object' || address === null) {
    throw new Error('Server is not listening on a port');
  }
  return { baseUrl: `http://127.0.0.1:${address.port}`, server };
}

const headers = (callerId: string, tags: string = '', role: string = 'member') => ({
  'X-Caller-Id': callerId,
  'X-Caller-Role': role,
  'X-Caller-Tags': tags
});

function uploadForm(filename: string, text: string, tags: string): FormData {
  const form = new FormData();
  form.append('file', new Blob([text], { type: 'text/plain' }), filename);
  form.append('tags', tags);
  return form;
}

function documentIdOf(body: unknown): string {
  if (typeof body === 'object' && body !== null && 'documentId' in body && typeof body.documentId === 'string') {
    return body.documentId;
  }
  throw new Error('Response carries no documentId');
}

describe('HTTP API', () => {
  let running: RunningApp | null = null;

  afterEach(async () => {
    const current = running;
    running = null;
    if (current) {
      await new Promise<void>((resolve, reject) => current.server.close(error => (error ? reject(error) : resolve())));
    }
  });

  const postJson = (path: string, body: unknown, requestHeaders: Record<string, string>) => {
    if (!running) throw new Error('App is not running');
    return fetch(`${running.baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...requestHeaders },
      body: JSON.stringify(body)
    });
  };

  it('should report health without a Q&A service', async () => {
    running = await start(null);

    const res = await fetch(`${running.baseUrl}/health`);

    expect(res.status).toBe(200);
    await expect(res.json()).resolves.toMatchObject({ status: 'healthy', qaAvailable: false });
  });

  it('should answer 503 while the Q&A service is not configured', async () => {
    running = await start(null);

    const res = await postJson('/api/qa/ask', { question: 'What is the leave policy?' }, headers('alice'));

    expect(res.status).toBe(503);
    await expect(res.json()).resolves.toEqual({
      error: 'service_unavailable',
      message: 'Document Q&A service is not initialized'
    });
  });

  it('should require caller identity headers', async () => {
    running = await start(createHarness().service);

    const res = await postJson('/api/qa/ask', { question: 'What is the leave policy?' }, {});

    expect(res.status).toBe(401);
    await expect(res.json()).resolves.toEqual({ error: 'unauthenticated', message: 'Caller identity headers are missing' });
  });

  it('should reject an unknown caller role', async () => {
    running = await start(createHarness().service);

    const res = await postJson('/api/qa/ask', { question: 'What is the leave policy?' }, headers('alice', 'hr', 'owner'));

    expect(res.status).toBe(400);
    await expect(res.json()).resolves.toEqual({ error: 'validation', message: "Unknown caller role 'owner'" });
  });

  it('should index an upload and reuse it for the same content', async () => {
    running = await start(createHarness().service);
    const url = `${running.baseUrl}/api/documents`;

    const created = await fetch(url, { method: 'POST', headers: headers('alice', 'hr'), body: uploadForm('policy.txt', POLICY_TEXT, 'hr') });
    expect(created.status).toBe(201);
    const body: unknown = await created.json();
    expect(body).toMatchObject({ success: true, status: 'indexed', reused: false });

    const reused = await fetch(url, { method: 'POST', headers: headers('alice', 'hr'), body: uploadForm('policy.txt', POLICY_TEXT, 'hr') });
    expect(reused.status).toBe(200);
    await expect(reused.json()).resolves.toEqual({ success: true, documentId: documentIdOf(body), status: 'indexed', reused: true });
  });

  it('should reject an upload without a file', async () => {
    running = await start(createHarness().service);
    const form = new FormData();
    form.append('tags', 'hr');

    const res = await fetch(`${running.baseUrl}/api/documents`, { method: 'POST', headers: headers('alice'), body: form });

    expect(res.status).toBe(400);
    await expect(res.json()).resolves.toEqual({
      error: 'validation',
      message: 'No file uploaded',
      details: ['Please provide a document in the "file" field']
    });
  });

  it('should answer questions with citations and hide documents outside the scope', async () => {
    const { service, submitText } = createHarness();
    const { documentId } = await submitText(member('alice'), 'policy.txt', POLICY_TEXT, ['hr']);
    running = await start(service);

    const answered = await postJson('/api/qa/ask', { question: 'How many vacation days accrue?' }, headers('carol', 'hr'));
    expect(answered.status).toBe(200);
    await expect(answered.json()).resolves.toMatchObject({
      status: 'ok',
      answer: 'The documents cover this [1].',
      citations: [{ documentId, filename: 'policy.txt', sequenceIndex: 0 }],
      insufficientEvidence: false
    });

    const denied = await postJson('/api/qa/ask', { question: 'How many vacation days accrue?', documentId }, headers('dave', 'eng'));
    expect(denied.status).toBe(403);
    await expect(denied.json()).resolves.toEqual({
      error: 'permission_denied',
      message: 'You do not have access to this document'
    });
  });

  it('should tell an admin that a document does not exist', async () => {
    running = await start(createHarness().service);

    const res = await fetch(`${running.baseUrl}/api/documents/doc:missing`, { method: 'DELETE', headers: headers('root', '', 'admin') });

    expect(res.status).toBe(404);
    await expect(res.json()).resolves.toEqual({ error: 'not_found', message: 'Document doc:missing not found' });
  });

  it('should suggest questions for a topic', async () => {
    running = await start(createHarness().service);

    const res = await fetch(`${running.baseUrl}/api/qa/suggestions?context=remote%20work`, { headers: headers('alice') });

    expect(res.status).toBe(200);
    const body: unknown = await res.json();
    expect(body).toHaveProperty('context', 'remote work');
    expect(body).toHaveProperty('suggestions', expect.arrayContaining(['How is remote work addressed?']));
  });

  it('should answer 429 with Retry-After once the caller exceeds the rate limit', async () => {
    running = await start(createHarness({ options: { rateLimitPerMinute: 1, now: () => 1000 } }).service);

    const first = await postJson('/api/qa/ask', { question: 'What is the leave policy?' }, headers('alice'));
    expect(first.status).toBe(200);
    await first.json();
    const limited = await postJson('/api/qa/ask', { question: 'What is the leave policy?' }, headers('alice'));

    expect(limited.status).toBe(429);
    expect(limited.headers.get('Retry-After')).toBe('60');
    await expect(limited.json()).resolves.toEqual({ error: 'rate_limited', message: 'Rate limit exceeded, retry in 60s' });
  });
});
