// server.test.ts - Routing tests for SiteServer, driven without a socket

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as path from 'path';
import { bootstrap, type Site } from '../../src/bootstrap';
import { PROJECT_ROOT, type SiteConfig } from '../../src/config';
import { OFFLINE_REPLY } from '../../src/gateway/reply-resolver';
import type { SiteRequest } from '../../src/server';
import { MockMailer } from '../mocks/mailer.mock';
import { MockProvider } from '../mocks/provider.mock';
import { captureLogs, type LogCapture } from '../mocks/logs.mock';

const CONFIG: SiteConfig = {
  port: 0,
  debug: false,
  settings: {},
  completion: {
    provider: 'openai',
    model: 'test-model',
    temperature: 0.7,
    maxTokens: 600,
    timeoutMs: 30000,
  },
  mail: {
    transport: 'console',
    host: 'smtp.example.com',
    port: 587,
    useTls: true,
    user: 'no-reply@example.com',
    password: '',
    from: 'Site <no-reply@example.com>',
    contactRecipient: 'team@example.com',
  },
  systemPromptPath: path.join(PROJECT_ROOT, 'prompts', 'system-prompt.txt'),
};

function request(method: string, url: string, body = '', cookie?: string): SiteRequest {
  return { method, url, cookie, body: async () => body };
}

describe('SiteServer.dispatch', () => {
  let logs: LogCapture;
  let provider: MockProvider;
  let mailer: MockMailer;
  let env: NodeJS.ProcessEnv;
  let site: Site;

  beforeEach(async () => {
    logs = captureLogs();
    provider = new MockProvider();
    mailer = new MockMailer();
    env = { MOCK_API_KEY: 'test-secret-0000' };
    site = await bootstrap(CONFIG, { provider, mailer, env });
  });

  afterEach(() => {
    logs.restore();
  });

  it('should serve the homepage and about page', async () => {
    const home = await site.server.dispatch(request('GET', '/'));
    const about = await site.server.dispatch(request('GET', '/about/'));

    expect(home.status).toBe(200);
    expect(home.body).toContain('<h3>VISION</h3>');
    expect(about.status).toBe(200);
  });

  it('should send the system prompt with chat messages', async () => {
    provider.client.complete.mockResolvedValue('Sounds good.');

    const result = await site.server.dispatch(request('POST', '/chat', '{"message":" hi "}'));

    expect(result.status).toBe(200);
    expect(JSON.parse(result.body)).toEqual({ reply: 'Sounds good.' });
    const sent = provider.client.complete.mock.calls[0][0];
    expect(sent.messages[0].role).toBe('system');
    expect(sent.messages[0].content.startsWith('You are Liora')).toBe(true);
    expect(sent.messages[1]).toEqual({ role: 'user', content: 'hi' });
  });

  it('should answer on the original widget path too', async () => {
    provider.client.complete.mockResolvedValue('Hello.');

    const result = await site.server.dispatch(
      request('POST', '/chatbot-response/', '{"message":"hello"}')
    );

    expect(JSON.parse(result.body)).toEqual({ reply: 'Hello.' });
  });

  it('should return 400 for malformed chat bodies', async () => {
    const result = await site.server.dispatch(request('POST', '/chat', '<html>'));

    expect(result.status).toBe(400);
    expect(result.body).toBe('Invalid JSON');
  });

  it('should reject other methods on the chat path', async () => {
    const result = await site.server.dispatch(request('GET', '/chat'));

    expect(result.status).toBe(405);
    expect(result.headers.Allow).toBe('POST');
  });

  it('should degrade to the offline reply without a key', async () => {
    delete env.MOCK_API_KEY;

    const result = await site.server.dispatch(request('POST', '/chat', '{"message":"hello"}'));

    expect(JSON.parse(result.body)).toEqual({ reply: OFFLINE_REPLY });
  });

  it('should report health', async () => {
    const result = await site.server.dispatch(request('GET', '/chat/health'));

    expect(JSON.parse(result.body)).toEqual({
      sdk_installed: true,
      has_key_in_settings: false,
      has_key_in_env: true,
      key_seen: 'test…0000',
      client_initialized: true,
      debug: false,
    });
  });

  it('should set a session cookie once and reuse the conversation id', async () => {
    const first = await site.server.dispatch(request('POST', '/chat/start'));
    const cookie = first.headers['Set-Cookie'];

    expect(cookie).toMatch(/^sid=[0-9a-f-]{36}; Path=\/; HttpOnly; SameSite=Lax$/);

    const sid = cookie.split(';')[0];
    const second = await site.server.dispatch(request('POST', '/chat/start', '', sid));

    expect(second.headers['Set-Cookie']).toBeUndefined();
    expect(JSON.parse(second.body).conversation_id).toBe(JSON.parse(first.body).conversation_id);
  });

  it('should route the contact form', async () => {
    const get = await site.server.dispatch(request('GET', '/contact/submit/'));
    const spam = await site.server.dispatch(
      request('POST', '/contact/submit/', 'full_name=A&email=a%40example.com&hp=bot')
    );

    expect(get.headers.Location).toBe('/#contact');
    expect(spam.headers.Location).toBe('/#contact?ok=0');
    expect(mailer.send).not.toHaveBeenCalled();
  });

  it('should ignore query strings when routing', async () => {
    const result = await site.server.dispatch(request('GET', '/chat/health?verbose=1'));
    expect(result.status).toBe(200);
  });

  it('should answer 400 for a request target that is not a URL', async () => {
    const result = await site.server.dispatch(request('GET', '//['));

    expect(result.status).toBe(400);
    expect(JSON.parse(result.body)).toEqual({ error: 'bad request' });
    expect(logs.lines.filter((l) => l.level === 'ERROR')).toHaveLength(0);
  });

  it('should return 404 for unknown paths', async () => {
    const result = await site.server.dispatch(request('GET', '/admin'));

    expect(result.status).toBe(404);
    expect(JSON.parse(result.body)).toEqual({ error: 'not found' });
  });
});
