import { describe, it, expect } from 'vitest';
import { mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadConfig } from './env.js';
import { ConfigError } from '../types.js';

const base = { DISCORD_TOKEN: 'test-token', COMPLETION_API_KEY: 'test-secret' };

describe('loadConfig', () => {
  it('should apply defaults', () => {
    expect(loadConfig(base)).toEqual({
      discordToken: 'test-token',
      completion: {
        apiKey: 'test-secret',
        baseUrl: 'https://api.x.ai/v1',
        model: 'grok-4',
        timeoutMs: 60000,
      },
      maxSnippetLen: 160,
      historyCapacity: 30,
    });
  });

  it('should read numeric overrides', () => {
    const config = loadConfig({ ...base, MAX_SNIPPET_LEN: '80', MESSAGE_LIMIT: '5', COMPLETION_TIMEOUT_MS: '1500' });

    expect(config.maxSnippetLen).toBe(80);
    expect(config.historyCapacity).toBe(5);
    expect(config.completion.timeoutMs).toBe(1500);
  });

  it('should treat blank values as unset', () => {
    const config = loadConfig({ ...base, MAX_SNIPPET_LEN: '', COMPLETION_MODEL: '  ' });

    expect(config.maxSnippetLen).toBe(160);
    expect(config.completion.model).toBe('grok-4');
  });

  it('should accept XAI_API_KEY as the completion key', () => {
    const config = loadConfig({ DISCORD_TOKEN: 'test-token', XAI_API_KEY: 'test-xai' });

    expect(config.completion.apiKey).toBe('test-xai');
  });

  it('should fail without a Discord token', () => {
    expect(() => loadConfig({ COMPLETION_API_KEY: 'test-secret' })).toThrow(ConfigError);
  });

  it('should fail without a completion key', () => {
    expect(() => loadConfig({ DISCORD_TOKEN: 'test-token' })).toThrow(/COMPLETION_API_KEY missing/);
  });

  it('should reject non-positive numbers', () => {
    expect(() => loadConfig({ ...base, MESSAGE_LIMIT: '0' })).toThrow(/MESSAGE_LIMIT/);
    expect(() => loadConfig({ ...base, MAX_SNIPPET_LEN: 'lots' })).toThrow(ConfigError);
  });

  it('should read the Discord token from a file', () => {
    const dir = mkdtempSync(join(tmpdir(), 'relay-config-'));
    const tokenFile = join(dir, 'discord_token');
    writeFileSync(tokenFile, 'file-token\n');

    const config = loadConfig({ COMPLETION_API_KEY: 'test-secret', DISCORD_TOKEN_FILE: tokenFile });

    expect(config.discordToken).toBe('file-token');
  });

  it('should report an unreadable token file', () => {
    expect(() =>
      loadConfig({ COMPLETION_API_KEY: 'test-secret', DISCORD_TOKEN_FILE: '/nonexistent/discord_token' })
    ).toThrow('Could not read token file: /nonexistent/discord_token');
  });
});
