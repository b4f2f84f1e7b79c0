/**
 * Tests for the Docker Hub webhook route
 */

import express from 'express';
import request from 'supertest';
import MockAdapter from 'axios-mock-adapter';
import { parseConfig } from '../config';
import { createServer } from '../server';
import { createCallbackHttp } from '../services/callback';
import { FakeEngine } from '../testing/fake-engine';
import { ReceiverConfig } from '../types';

const CALLBACK_URL = 'https://registry.hub.docker.com/u/acme/web/hook/abc123/';

const config: ReceiverConfig = parseConfig(
  {
    container: {
      name: 'app',
      repository: 'acme/web',
      command: ['--host', 'demo.example.com'],
    },
    callback: { targetUrl: 'https://demo.example.com' },
    rollback: { enabled: false },
  },
  {}
);

function payload(callbackUrl: string = CALLBACK_URL): string {
  return JSON.stringify({
    callback_url: callbackUrl,
    push_data: { pushed_at: 1700000000, images: [], tag: 'latest', pusher: 'builder' },
    repository: { repo_name: 'acme/web', namespace: 'acme', name: 'web' },
  });
}

describe('POST /docker-webhook', () => {
  let app: express.Express;
  let engine: FakeEngine;
  let mock: MockAdapter;

  beforeEach(() => {
    engine = new FakeEngine();
    const callbackHttp = createCallbackHttp(1000);
    mock = new MockAdapter(callbackHttp);
    mock.onPost(CALLBACK_URL).reply(200);
    app = createServer({ config, engine, callbackHttp }).app;
  });

  afterEach(() => {
    mock.restore();
  });

  function post(body: string) {
    return request(app)
      .post('/docker-webhook')
      .set('Content-Type', 'application/json')
      .send(body);
  }

  test('should acknowledge and redeploy a genuine notification', async () => {
    const response = await post(payload());

    expect(response.status).toBe(200);
    expect(response.text).toBe('');
    expect(engine.ops()).toEqual(['stop', 'remove', 'pull', 'create', 'start']);
    expect(mock.history.post).toHaveLength(1);
    expect(mock.history.post[0].url).toBe(CALLBACK_URL);
    expect(JSON.parse(mock.history.post[0].data)).toEqual({
      state: 'success',
      description: 'Redeploy was successful',
      context: 'docker-webhook-receiver',
      target_url: 'https://demo.example.com',
    });
  });

  test('should create the container with the configured image, command and port', async () => {
    await post(payload());

    expect(engine.calls.find((c) => c.op === 'create')).toEqual({
      op: 'create',
      spec: {
        name: 'app',
        image: 'acme/web:latest',
        command: ['--host', 'demo.example.com'],
        ports: [{ containerPort: 443, hostPort: 443 }],
      },
    });
  });

  test('should accept a body without a JSON content type', async () => {
    const response = await request(app)
      .post('/docker-webhook')
      .set('Content-Type', 'text/plain')
      .send(payload());

    expect(response.status).toBe(200);
    expect(engine.ops()).toHaveLength(5);
  });

  test.each([
    ['invalid JSON', '{"callback_url":'],
    ['an empty body', ''],
    ['a JSON array', '[]'],
    ['a numeric callback_url', '{"callback_url":1}'],
  ])('should answer 400 to %s without side effects', async (_label, body) => {
    const response = await post(body);

    expect(response.status).toBe(400);
    expect(response.text).toBe('');
    expect(engine.calls).toHaveLength(0);
    expect(mock.history.post).toHaveLength(0);
  });

  test('should answer 400 to a callback URL outside the trusted prefix', async () => {
    const response = await post(payload('https://evil.example.com/u/acme/web/hook/abc123/'));

    expect(response.status).toBe(400);
    expect(engine.calls).toHaveLength(0);
    expect(mock.history.post).toHaveLength(0);
  });

  test('should answer 400 when callback_url is missing', async () => {
    const response = await post('{"push_data":{"tag":"latest"}}');

    expect(response.status).toBe(400);
    expect(engine.calls).toHaveLength(0);
  });

  test('should answer 400 to mistyped push details from a trusted callback', async () => {
    const body = JSON.stringify({
      callback_url: CALLBACK_URL,
      push_data: { tag: 5, pushed_at: 'yesterday' },
      repository: { star_count: 'many' },
    });

    const response = await post(body);

    expect(response.status).toBe(400);
    expect(engine.calls).toHaveLength(0);
    expect(mock.history.post).toHaveLength(0);
  });

  test('should redeploy when push_data and repository are null', async () => {
    const response = await post(JSON.stringify({ callback_url: CALLBACK_URL, push_data: null, repository: null }));

    expect(response.status).toBe(200);
    expect(engine.ops()).toEqual(['stop', 'remove', 'pull', 'create', 'start']);
    expect(mock.history.post).toHaveLength(1);
  });

  test('should answer 400 to a body over the size limit', async () => {
    const big = JSON.stringify({ callback_url: CALLBACK_URL, padding: 'x'.repeat(2 * 1024 * 1024) });
    const response = await post(big);

    expect(response.status).toBe(400);
    expect(engine.calls).toHaveLength(0);
    expect(mock.history.post).toHaveLength(0);
  });

  test('should not touch the engine when the callback cannot be reached', async () => {
    mock.onPost(CALLBACK_URL).networkError();

    const response = await post(payload());

    expect(response.status).toBe(500);
    expect(response.text).toBe('');
    expect(engine.calls).toHaveLength(0);
  });

  test('should redeploy whatever status the callback answers with', async () => {
    mock.onPost(CALLBACK_URL).reply(404);

    const response = await post(payload());

    expect(response.status).toBe(200);
    expect(engine.ops()).toHaveLength(5);
  });

  test('should answer 500 and stop when the container cannot be stopped', async () => {
    engine.failOn('stop', new Error('No such container: app'));

    const response = await post(payload());

    expect(response.status).toBe(500);
    expect(response.text).toBe('');
    expect(engine.ops()).toEqual(['stop']);
  });

  test.each([
    ['remove', ['stop', 'remove']],
    ['pull', ['stop', 'remove', 'pull']],
    ['create', ['stop', 'remove', 'pull', 'create']],
    ['start', ['stop', 'remove', 'pull', 'create', 'start']],
  ] as const)('should answer 500 when %s fails', async (op, expected) => {
    engine.failOn(op);

    const response = await post(payload());

    expect(response.status).toBe(500);
    expect(engine.ops()).toEqual(expected);
  });

  test('should handle two notifications back to back', async () => {
    const [first, second] = await Promise.all([post(payload()), post(payload())]);

    expect(first.status).toBe(200);
    expect(second.status).toBe(200);
    expect(engine.ops()).toEqual([
      'stop', 'remove', 'pull', 'create', 'start',
      'stop', 'remove', 'pull', 'create', 'start',
    ]);
    expect(mock.history.post).toHaveLength(2);
  });

  test('should reject other methods', async () => {
    const response = await request(app).get('/docker-webhook');

    expect(response.status).toBe(404);
    expect(engine.calls).toHaveLength(0);
  });
});

describe('GET /health', () => {
  test('should report ok without calling the engine', async () => {
    const engine = new FakeEngine();
    const { app } = createServer({ config, engine });

    const response = await request(app).get('/health');

    expect(response.status).toBe(200);
    expect(response.body.status).toBe('ok');
    expect(engine.calls).toHaveLength(0);
  });
});
