import { FastifyInstance } from 'fastify';
import fetch from 'node-fetch';
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';

import { buildRoutingIndex } from '../src/services/BootstrapService';
import { Logger } from '../src/services/Logger';
import { UpstreamRegistry } from '../src/services/UpstreamRegistry';
import { DefaultRoutingStrategy } from '../src/strategy/RoutingStrategy';
import { createGatewayServer, RunningServer, startServer } from '../src/server';
import { RouteOutcome } from '../src/types';
import { resolvedUpstream, silentBehaviors } from './helpers/fixtures';
import { MockUpstream, startMockUpstream } from './helpers/mock-upstream';

describe('gateway HTTP surface', () => {
  let upstream: MockUpstream;
  let server: FastifyInstance;

  beforeAll(async () => {
    upstream = await startMockUpstream(() => ({ body: {} }));
    const registry = new UpstreamRegistry(
      buildRoutingIndex([resolvedUpstream('main', 'good-evm-rpc', upstream.url, 1, 0)]),
      ['main']
    );
    const strategy = new DefaultRoutingStrategy(registry, silentBehaviors(), Logger.silent(), {
      defaultResponseTimeoutMs: 2000
    });
    server = createGatewayServer(strategy, Logger.silent());
    await server.ready();
  });

  afterAll(async () => {
    await server.close();
    await upstream.close();
  });

  beforeEach(() => {
    upstream.calls.length = 0;
    upstream.setHandler(call => ({ body: { jsonrpc: '2.0', id: call.id, result: { hash: '0xabc' } } }));
  });

  it('responds with the bare result object', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/main/1',
      payload: { jsonrpc: '2.0', id: 1, method: 'eth_getBlockByNumber', params: ['0x1273c18', false] }
    });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toContain('application/json');
    expect(response.body).toBe('{"hash":"0xabc"}');
    expect(upstream.calls[0].params).toEqual(['0x1273c18', false]);
  });

  it('accepts a trailing slash', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/main/1/',
      payload: { jsonrpc: '2.0', id: 1, method: 'eth_blockNumber' }
    });

    expect(response.statusCode).toBe(200);
  });

  it('serialises scalar and null results as JSON', async () => {
    upstream.setHandler(call => ({ body: { jsonrpc: '2.0', id: call.id, result: '0x1273c18' } }));
    const scalar = await server.inject({
      method: 'POST',
      url: '/main/1',
      payload: { jsonrpc: '2.0', id: 1, method: 'eth_blockNumber' }
    });
    expect(scalar.body).toBe('"0x1273c18"');

    upstream.setHandler(call => ({ body: { jsonrpc: '2.0', id: call.id, result: null } }));
    const empty = await server.inject({
      method: 'POST',
      url: '/main/1',
      payload: { jsonrpc: '2.0', id: 1, method: 'eth_getTransactionByHash', params: ['0xdead'] }
    });
    expect(empty.statusCode).toBe(200);
    expect(empty.body).toBe('null');
  });

  it('answers an unknown project with 404', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/nope/1',
      payload: { jsonrpc: '2.0', id: 7, method: 'eth_blockNumber' }
    });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      jsonrpc: '2.0',
      id: 7,
      error: { code: -32001, message: 'Unknown project: nope', data: { kind: 'UnknownProject', projectId: 'nope' } }
    });
    expect(upstream.calls).toHaveLength(0);
  });

  it('answers an unsupported chain with 400', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/main/137',
      payload: { jsonrpc: '2.0', id: 'abc', method: 'eth_blockNumber' }
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      jsonrpc: '2.0',
      id: 'abc',
      error: {
        code: -32002,
        message: 'Project main has no upstream for chain 137',
        data: { kind: 'UnsupportedChain', projectId: 'main', chainId: 137 }
      }
    });
  });

  it('rejects a chain id that is not an integer', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/main/mainnet',
      payload: { jsonrpc: '2.0', id: 3, method: 'eth_blockNumber' }
    });

    expect(response.statusCode).toBe(400);
    const body = response.json();
    expect(body.id).toBe(3);
    expect(body.error.code).toBe(-32600);
    expect(body.error.message).toBe('Invalid route');
  });

  it('rejects a body that is not a JSON-RPC 2.0 request', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/main/1',
      payload: { jsonrpc: '1.0', id: 4, method: 'eth_blockNumber' }
    });

    expect(response.statusCode).toBe(400);
    const body = response.json();
    expect(body.id).toBe(4);
    expect(body.error.code).toBe(-32600);
    expect(body.error.message).toBe('Invalid Request');
  });

  it('rejects batch requests', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/main/1',
      payload: [{ jsonrpc: '2.0', id: 1, method: 'eth_blockNumber' }]
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      jsonrpc: '2.0',
      id: null,
      error: { code: -32600, message: 'Batch requests are not supported' }
    });
  });

  it('answers malformed JSON with a parse error', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/main/1',
      headers: { 'content-type': 'application/json' },
      payload: '{"jsonrpc": "2.0",'
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().error.code).toBe(-32700);
  });

  it('answers an empty JSON body with a parse error', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/main/1',
      headers: { 'content-type': 'application/json' },
      payload: ''
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().error.code).toBe(-32700);
    expect(upstream.calls).toHaveLength(0);
  });

  it('answers an oversized body as an invalid request', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/main/1',
      headers: { 'content-type': 'application/json' },
      payload: JSON.stringify({ jsonrpc: '2.0', id: 1, method: 'eth_call', params: ['x'.repeat(1_100_000)] })
    });

    expect(response.statusCode).toBe(413);
    expect(response.json()).toMatchObject({ jsonrpc: '2.0', id: null, error: { code: -32600, message: 'Invalid Request' } });
    expect(upstream.calls).toHaveLength(0);
  });

  it('answers a non-JSON content type as an invalid request', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/main/1',
      headers: { 'content-type': 'application/xml' },
      payload: '<call>eth_blockNumber</call>'
    });

    expect(response.statusCode).toBe(415);
    expect(response.json().error.code).toBe(-32600);
  });

  it('passes upstream JSON-RPC errors through with a 502', async () => {
    upstream.setHandler(call => ({
      body: { jsonrpc: '2.0', id: call.id, error: { code: -32000, message: 'header not found' } }
    }));

    const response = await server.inject({
      method: 'POST',
      url: '/main/1',
      payload: { jsonrpc: '2.0', id: 11, method: 'eth_getBlockByNumber', params: ['0xffffffff', false] }
    });

    expect(response.statusCode).toBe(502);
    expect(response.json()).toEqual({
      jsonrpc: '2.0',
      id: 11,
      error: { code: -32000, message: 'header not found', data: { kind: 'UpstreamRpcError', upstreamId: 'good-evm-rpc' } }
    });
  });

  it('reports an unreachable upstream with a 502', async () => {
    upstream.setHandler(() => ({ status: 502, rawBody: 'bad gateway' }));

    const response = await server.inject({
      method: 'POST',
      url: '/main/1',
      payload: { jsonrpc: '2.0', id: 12, method: 'eth_blockNumber' }
    });

    expect(response.statusCode).toBe(502);
    expect(response.json()).toEqual({
      jsonrpc: '2.0',
      id: 12,
      error: {
        code: -32003,
        message: 'Upstream good-evm-rpc unreachable: HTTP 502',
        data: { kind: 'UpstreamUnreachable', upstreamId: 'good-evm-rpc', reason: 'http-status' }
      }
    });
  });

  it('lists the routing table on /health', async () => {
    const response = await server.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json().projects).toEqual([{ project: 'main', chains: { '1': ['good-evm-rpc'] } }]);
  });
});

describe('gateway listener lifecycle', () => {
  let upstream: MockUpstream;
  let strategy: DefaultRoutingStrategy;
  let running: RunningServer | undefined;
  let outcomes: RouteOutcome[];

  beforeEach(async () => {
    upstream = await startMockUpstream(call => ({ body: { jsonrpc: '2.0', id: call.id, result: '0x1' } }));
    const registry = new UpstreamRegistry(
      buildRoutingIndex([resolvedUpstream('main', 'good-evm-rpc', upstream.url, 1, 0)]),
      ['main']
    );
    strategy = new DefaultRoutingStrategy(registry, silentBehaviors(), Logger.silent(), {
      defaultResponseTimeoutMs: 10000
    });

    outcomes = [];
    const route = strategy.route.bind(strategy);
    vi.spyOn(strategy, 'route').mockImplementation(async (request, options) => {
      const outcome = await route(request, options);
      outcomes.push(outcome);
      return outcome;
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await running?.shutdown();
    running = undefined;
    await upstream.close();
  });

  async function listen(shutdownGraceMs: number): Promise<RunningServer> {
    running = await startServer({ httpHost: '127.0.0.1', httpPort: 0, shutdownGraceMs }, strategy, Logger.silent());
    return running;
  }

  function post(address: string, signal?: AbortSignal) {
    return fetch(`${address}/main/1`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ jsonrpc: '2.0', id: 7, method: 'eth_blockNumber' }),
      signal
    });
  }

  it('cancels the upstream call when the client disconnects', async () => {
    upstream.setHandler(call => ({ body: { jsonrpc: '2.0', id: call.id, result: '0x1' }, delayMs: 5000 }));
    const { address } = await listen(1000);
    const client = new AbortController();

    const pending = post(address, client.signal);
    await vi.waitFor(() => expect(upstream.calls).toHaveLength(1));
    client.abort();

    await expect(pending).rejects.toThrow();
    await vi.waitFor(() => expect(upstream.abandonedCalls).toHaveLength(1), { timeout: 3000 });
    await vi.waitFor(() => expect(outcomes).toHaveLength(1), { timeout: 3000 });
    expect(outcomes[0]).toMatchObject({
      success: false,
      upstreamId: 'good-evm-rpc',
      stage: 'UpstreamSelected',
      error: { kind: 'UpstreamUnreachable', reason: 'aborted' }
    });
  });

  it('lets an in-flight request finish within the grace period', async () => {
    upstream.setHandler(call => ({ body: { jsonrpc: '2.0', id: call.id, result: '0x2a' }, delayMs: 300 }));
    const server = await listen(3000);

    const pending = post(server.address);
    await vi.waitFor(() => expect(upstream.calls).toHaveLength(1));
    const closing = server.shutdown();

    const response = await pending;
    expect(response.status).toBe(200);
    expect(await response.json()).toBe('0x2a');
    await closing;
    expect(upstream.abandonedCalls).toHaveLength(0);
  });

  it('cuts off requests that outlive the grace period', async () => {
    upstream.setHandler(call => ({ body: { jsonrpc: '2.0', id: call.id, result: '0x2a' }, delayMs: 5000 }));
    const server = await listen(200);

    const pending = post(server.address);
    const settled = pending.then(
      () => 'answered',
      () => 'cut off'
    );
    await vi.waitFor(() => expect(upstream.calls).toHaveLength(1));

    const startedAt = Date.now();
    await server.shutdown();
    const elapsed = Date.now() - startedAt;

    expect(elapsed).toBeGreaterThanOrEqual(190);
    expect(elapsed).toBeLessThan(2000);
    expect(await settled).toBe('cut off');
  });
});
