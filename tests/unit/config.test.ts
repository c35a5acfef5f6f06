// config.test.ts - Unit tests for configuration loading

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigError, PROJECT_ROOT, loadConfig, parseDuration } from '../../src/config';

describe('parseDuration', () => {
  it('should parse seconds, minutes, hours and milliseconds', () => {
    expect(parseDuration('30s', 1)).toBe(30000);
    expect(parseDuration('1m30s', 1)).toBe(90000);
    expect(parseDuration('2m', 1)).toBe(120000);
    expect(parseDuration('1h', 1)).toBe(3600000);
    expect(parseDuration('500ms', 1)).toBe(500);
    expect(parseDuration('1.5s', 1)).toBe(1500);
  });

  it('should use the fallback when nothing parses', () => {
    expect(parseDuration('soon', 30000)).toBe(30000);
    expect(parseDuration('', 30000)).toBe(30000);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'site-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeSettings(content: string): string {
    const file = path.join(dir, 'settings.json');
    fs.writeFileSync(file, content);
    return file;
  }

  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({ SITE_SETTINGS_FILE: writeSettings('{}') });

    expect(config.port).toBe(8000);
    expect(config.debug).toBe(false);
    expect(config.settings).toEqual({});
    expect(config.completion).toEqual({
      provider: 'openai',
      model: 'gpt-4o-mini',
      temperature: 0.7,
      maxTokens: 600,
      timeoutMs: 30000,
      baseUrl: undefined,
    });
    expect(config.mail.transport).toBe('smtp');
    expect(config.mail.port).toBe(587);
    expect(config.mail.contactRecipient).toBe('hello@liorae.co');
    expect(config.systemPromptPath).toBe(path.join(PROJECT_ROOT, 'prompts', 'system-prompt.txt'));
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      SITE_SETTINGS_FILE: writeSettings('{}'),
      PORT: '3000',
      DEBUG: 'true',
      CHAT_PROVIDER: 'anthropic',
      CHAT_TIMEOUT: '10s',
      CHAT_MAX_TOKENS: '300',
      ANTHROPIC_BASE_URL: 'http://localhost:8081',
      CONTACT_RECIPIENT: 'sales@example.com',
    });

    expect(config.port).toBe(3000);
    expect(config.debug).toBe(true);
    expect(config.completion.provider).toBe('anthropic');
    expect(config.completion.model).toBe('claude-3-5-haiku-latest');
    expect(config.completion.timeoutMs).toBe(10000);
    expect(config.completion.maxTokens).toBe(300);
    expect(config.completion.baseUrl).toBe('http://localhost:8081');
    expect(config.mail.transport).toBe('console');
    expect(config.mail.contactRecipient).toBe('sales@example.com');
  });

  it('should let the settings file win over the environment', () => {
    const file = writeSettings(
      JSON.stringify({
        apiKey: 'settings-secret',
        debug: false,
        chatModel: 'gpt-4o',
        contactRecipient: 'owner@example.com',
      })
    );
    const config = loadConfig({
      SITE_SETTINGS_FILE: file,
      DEBUG: 'true',
      CHAT_MODEL: 'ignored',
      CONTACT_RECIPIENT: 'ignored@example.com',
    });

    expect(config.settingsFile).toBe(file);
    expect(config.settings.apiKey).toBe('settings-secret');
    expect(config.debug).toBe(false);
    expect(config.completion.model).toBe('gpt-4o');
    expect(config.mail.contactRecipient).toBe('owner@example.com');
  });

  it('should reject unknown settings keys', () => {
    const file = writeSettings('{"apiKey":"x","colour":"blue"}');
    expect(() => loadConfig({ SITE_SETTINGS_FILE: file })).toThrow(ConfigError);
  });

  it('should reject a settings file that is not JSON', () => {
    const file = writeSettings('apiKey=x');
    expect(() => loadConfig({ SITE_SETTINGS_FILE: file })).toThrow(/is not valid JSON/);
  });

  it('should reject an explicit settings path that does not exist', () => {
    expect(() => loadConfig({ SITE_SETTINGS_FILE: path.join(dir, 'missing.json') })).toThrow(
      /Settings file not found/
    );
  });

  it('should reject an unknown provider and bad numbers', () => {
    const file = writeSettings('{}');
    expect(() => loadConfig({ SITE_SETTINGS_FILE: file, CHAT_PROVIDER: 'mystery' })).toThrow(
      'Unsupported CHAT_PROVIDER "mystery"'
    );
    expect(() => loadConfig({ SITE_SETTINGS_FILE: file, PORT: 'eighty' })).toThrow(
      'PORT must be a number, got "eighty"'
    );
  });
});
