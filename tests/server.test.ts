import request from 'supertest';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { createApp, startSseServer } from '../src/server.js';
import type { SseServer } from '../src/server.js';
import { FakePortal, createContext } from './helpers/fakePortal.js';

describe('HTTP app', () => {
  const { app } = createApp(createContext(new FakePortal(), new Date(2025, 8, 15, 9, 0)));

  it('reports health without contacting the portal', async () => {
    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      status: 'ok',
      server: 'campus-portal-mcp',
      version: '1.0.0',
      session: { authenticated: false, logins: 0 },
      sseSessions: 0,
    });
    expect(res.body.tools).toHaveLength(30);
    expect(res.body.caches).toEqual([
      { name: 'timetable', cached: false, ageSeconds: null, hits: 0, misses: 0 },
      { name: 'courses', cached: false, ageSeconds: null, hits: 0, misses: 0 },
    ]);
  });

  it('rejects messages for unknown SSE sessions', async () => {
    const res = await request(app)
      .post('/messages?sessionId=missing')
      .send({ jsonrpc: '2.0', id: 1, method: 'tools/list' });

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: "No active SSE session 'missing'" });
  });
});

describe('SSE transport', () => {
  let running: SseServer | null = null;
  let client: Client | null = null;

  afterEach(async () => {
    await client?.close();
    await running?.close();
    client = null;
    running = null;
  });

  async function connect() {
    running = await startSseServer(createContext(new FakePortal(), new Date(2025, 8, 15, 12, 30)), '127.0.0.1', 0);
    client = new Client({ name: 'test-client', version: '0.0.0' });
    await client.connect(new SSEClientTransport(new URL(`http://127.0.0.1:${running.port}/sse`)));
    return { server: running, mcp: client };
  }

  it('serves tool calls over /sse and /messages', async () => {
    const { server, mcp } = await connect();
    expect(server.activeSessions()).toBe(1);

    const result = CallToolResultSchema.parse(await mcp.callTool({ name: 'get_break_schedule', arguments: {} }));
    const [content] = result.content;
    expect(content?.type).toBe('text');
    expect(content?.type === 'text' ? JSON.parse(content.text) : null).toMatchObject({
      status: 'success',
      data: { currentBreak: { name: 'Lunch Break', minutesRemaining: 70 } },
    });

    await mcp.close();
    client = null;
    await vi.waitFor(() => expect(server.activeSessions()).toBe(0));
  });

  it('shuts down while a client is still connected', async () => {
    const { server } = await connect();

    await server.close();
    running = null;

    expect(server.activeSessions()).toBe(0);
  });
});
