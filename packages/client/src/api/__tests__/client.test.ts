import { describe, it, expect } from 'vitest';
import { ApiClient, eventStreamUrl, tokenFromSearch, type FetchLike } from '../client';

interface Call {
  url: string;
  init: RequestInit;
}

function fakeFetch(respond: () => Promise<Response>): { fetch: FetchLike; calls: Call[] } {
  const calls: Call[] = [];
  return {
    calls,
    fetch: (url, init) => {
      calls.push({ url, init });
      return respond();
    },
  };
}

const json = (body: unknown, status = 200) =>
  Promise.resolve(new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } }));

describe('ApiClient', () => {
  it('returns the success envelope', async () => {
    const { fetch, calls } = fakeFetch(() => json({ success: true, data: null }));
    const api = new ApiClient({ fetch });
    expect(await api.currentProject()).toEqual({ success: true, data: null });
    expect(calls[0]?.url).toBe('/api/project/current');
    expect(calls[0]?.init.method).toBe('GET');
    expect(calls[0]?.init.body).toBeUndefined();
  });

  it('sends JSON bodies and the bearer token', async () => {
    const { fetch, calls } = fakeFetch(() =>
      json({ success: true, data: { storyId: '1-1', status: 'done', storyFile: 'updated', message: 'ok' } })
    );
    const api = new ApiClient({ fetch, token: 'test-secret', baseUrl: 'http://127.0.0.1:8765' });
    await api.updateStoryStatus('1-1', 'done');
    expect(calls[0]?.url).toBe('http://127.0.0.1:8765/api/story/update-status');
    expect(calls[0]?.init.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-secret',
    });
    expect(calls[0]?.init.body).toBe('{"storyId":"1-1","status":"done"}');
  });

  it('omits text for key actions', async () => {
    const { fetch, calls } = fakeFetch(() => json({ success: true, data: { success: true, detail: 'sent' } }));
    await new ApiClient({ fetch }).sendInput('escape');
    expect(calls[0]?.init.body).toBe('{"action":"escape"}');
  });

  it('passes error envelopes through', async () => {
    const failure = { success: false, error: 'NO_ACTIVE_PROJECT', message: 'No project is open' };
    const { fetch } = fakeFetch(() => json(failure, 404));
    expect(await new ApiClient({ fetch }).workflowStatus()).toEqual(failure);
  });

  it('turns network errors into a failure', async () => {
    const { fetch } = fakeFetch(() => Promise.reject(new Error('connection refused')));
    expect(await new ApiClient({ fetch }).sprintStatus()).toEqual({
      success: false,
      error: 'INTERNAL_ERROR',
      message: 'Server unreachable: connection refused',
    });
  });

  it('rejects bodies that are not an envelope', async () => {
    const { fetch } = fakeFetch(() => Promise.resolve(new Response('<html>', { status: 502 })));
    expect(await new ApiClient({ fetch }).agents()).toEqual({
      success: false,
      error: 'INTERNAL_ERROR',
      message: 'Unexpected response (HTTP 502) from /api/agents',
    });
  });

  it('encodes story ids in the path', async () => {
    const { fetch, calls } = fakeFetch(() => json({ success: false, error: 'NOT_FOUND', message: 'x' }, 404));
    await new ApiClient({ fetch }).storyDetail('1 1');
    expect(calls[0]?.url).toBe('/api/story/1%201');
  });
});

describe('token and stream URL helpers', () => {
  it('reads the token from the page query', () => {
    expect(tokenFromSearch('?token=test-secret&x=1')).toBe('test-secret');
    expect(tokenFromSearch('')).toBeUndefined();
  });

  it('builds the event stream URL', () => {
    expect(eventStreamUrl({ protocol: 'http:', host: '127.0.0.1:8765' })).toBe('ws://127.0.0.1:8765/api/events');
    expect(eventStreamUrl({ protocol: 'https:', host: 'dash.local' }, 'a b')).toBe('wss://dash.local/api/events?token=a%20b');
  });
});
