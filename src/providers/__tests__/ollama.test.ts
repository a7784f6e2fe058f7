import { createServer, type Server } from 'node:http';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { ProviderError } from '../../core/errors.js';
import { OllamaDecisionMaker, OllamaEmbedder } from '../ollama.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function stubFetch(respond: (url: string, init: RequestInit | undefined) => Response | Promise<Response>) {
  const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit) => respond(String(input), init));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => undefined,
    (error: unknown) => error
  );
}

describe('OllamaDecisionMaker', () => {
  it('posts a non-streaming generate request', async () => {
    const fetchMock = stubFetch(() => jsonResponse({ response: 'search_vector_db', done: true }));
    const decisionMaker = new OllamaDecisionMaker({ baseUrl: 'http://ollama.test:11434/', model: 'llama3' });

    await expect(decisionMaker.generate('Pick a tool', 50)).resolves.toBe('search_vector_db');

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://ollama.test:11434/api/generate');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'llama3',
      prompt: 'Pick a tool',
      stream: false,
      options: { temperature: 0.3, top_p: 0.9, num_predict: 50 },
    });
  });

  it('passes sampling options through', async () => {
    const fetchMock = stubFetch(() => jsonResponse({ response: '' }));
    await new OllamaDecisionMaker({ baseUrl: 'http://ollama.test', model: 'm', temperature: 0, topP: 1 }).generate('p', 10);

    const body: unknown = JSON.parse(String(fetchMock.mock.calls[0][1]?.body));
    expect(body).toMatchObject({ options: { temperature: 0, top_p: 1, num_predict: 10 } });
  });

  it('marks server errors retryable and client errors not', async () => {
    stubFetch(() => new Response('busy', { status: 503 }));
    const decisionMaker = new OllamaDecisionMaker({ baseUrl: 'http://ollama.test', model: 'm' });
    const serverError = await rejection(decisionMaker.generate('p', 10));
    expect(serverError).toBeInstanceOf(ProviderError);
    expect(serverError).toMatchObject({
      reason: 'network_error',
      retryable: true,
      message: 'Provider ollama network_error: http://ollama.test/api/generate returned HTTP 503',
    });

    stubFetch(() => new Response('no such model', { status: 404 }));
    await expect(decisionMaker.generate('p', 10)).rejects.toMatchObject({ reason: 'network_error', retryable: false });
  });

  it('wraps transport failures', async () => {
    stubFetch(() => {
      throw new TypeError('fetch failed');
    });
    const error = await rejection(new OllamaDecisionMaker({ baseUrl: 'http://ollama.test', model: 'm' }).generate('p', 10));
    expect(error).toMatchObject({
      reason: 'network_error',
      retryable: true,
      message: 'Provider ollama network_error: Request to http://ollama.test/api/generate failed: fetch failed',
    });
  });

  it('rejects bodies without a response string', async () => {
    stubFetch(() => jsonResponse({ error: 'model not loaded' }));
    await expect(
      new OllamaDecisionMaker({ baseUrl: 'http://ollama.test', model: 'm' }).generate('p', 10)
    ).rejects.toMatchObject({ reason: 'invalid_response', retryable: false });
  });

  it('rejects malformed JSON', async () => {
    stubFetch(() => new Response('not json', { status: 200 }));
    await expect(
      new OllamaDecisionMaker({ baseUrl: 'http://ollama.test', model: 'm' }).generate('p', 10)
    ).rejects.toMatchObject({ reason: 'invalid_response' });
  });
});

describe('OllamaEmbedder', () => {
  it('returns the embedding vector', async () => {
    const fetchMock = stubFetch(() => jsonResponse({ embedding: [0.1, 0.2, 0.3] }));
    const embedder = new OllamaEmbedder({ baseUrl: 'http://ollama.test', model: 'nomic-embed-text' });

    await expect(embedder.embed('orders table')).resolves.toEqual([0.1, 0.2, 0.3]);
    expect(fetchMock.mock.calls[0][0]).toBe('http://ollama.test/api/embeddings');
    expect(JSON.parse(String(fetchMock.mock.calls[0][1]?.body))).toEqual({
      model: 'nomic-embed-text',
      prompt: 'orders table',
    });
  });

  it('rejects an empty embedding', async () => {
    stubFetch(() => jsonResponse({ embedding: [] }));
    await expect(
      new OllamaEmbedder({ baseUrl: 'http://ollama.test', model: 'm' }).embed('x')
    ).rejects.toMatchObject({ reason: 'invalid_response' });
  });
});

describe('request timeout', () => {
  let server: Server | undefined;

  afterEach(async () => {
    const open = server;
    server = undefined;
    if (open) {
      open.closeAllConnections();
      await new Promise<void>((resolve) => open.close(() => resolve()));
    }
  });

  it('sends an abort signal only when a timeout is set', async () => {
    const fetchMock = stubFetch(() => jsonResponse({ response: 'ok' }));
    await new OllamaDecisionMaker({ baseUrl: 'http://ollama.test', model: 'm', timeoutMs: 1000 }).generate('p', 5);
    await new OllamaDecisionMaker({ baseUrl: 'http://ollama.test', model: 'm' }).generate('p', 5);

    expect(fetchMock.mock.calls[0][1]?.signal).toBeInstanceOf(AbortSignal);
    expect(fetchMock.mock.calls[1][1]?.signal).toBeUndefined();
  });

  it('maps an aborted request to a timeout', async () => {
    stubFetch(() => {
      throw new DOMException('The operation was aborted due to timeout', 'TimeoutError');
    });
    const error = await rejection(
      new OllamaEmbedder({ baseUrl: 'http://ollama.test', model: 'm', timeoutMs: 25 }).embed('x')
    );
    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({
      reason: 'timeout',
      retryable: true,
      message: 'Provider ollama timeout: Request to http://ollama.test/api/embeddings timed out after 25ms',
    });
  });

  it('closes the connection to a server that never answers', async () => {
    let requests = 0;
    const socketClosed = new Promise<void>((resolve) => {
      server = createServer((request) => {
        requests += 1;
        request.socket.once('close', () => resolve());
      });
    });
    const listening = server;
    if (!listening) throw new Error('server not created');
    await new Promise<void>((resolve) => listening.listen(0, '127.0.0.1', () => resolve()));
    const address = listening.address();
    if (address === null || typeof address === 'string') throw new Error('expected a TCP address');

    const decisionMaker = new OllamaDecisionMaker({ baseUrl: `http://127.0.0.1:${address.port}`, model: 'm', timeoutMs: 50 });
    const error = await rejection(decisionMaker.generate('p', 5));

    expect(error).toMatchObject({ reason: 'timeout' });
    await socketClosed;
    expect(requests).toBe(1);
  });
});
