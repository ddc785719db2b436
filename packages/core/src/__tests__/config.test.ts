import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { resolveConfig } from '../config.js';

describe('resolveConfig', () => {
  const originalEnv = process.env;
  let dir: string;

  beforeEach(() => {
    process.env = { ...originalEnv };
    for (const key of Object.keys(process.env)) {
      if (key.startsWith('PHISHLENS_') || key === 'ALLOWED_ORIGINS') delete process.env[key];
    }
    dir = mkdtempSync(join(tmpdir(), 'phishlens-config-'));
  });

  afterEach(() => {
    process.env = originalEnv;
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('returns defaults when no env vars or overrides', () => {
    const config = resolveConfig();
    expect(config.modelVersion).toBe('0.1.0-ml');
    expect(config.locale).toBe('en');
    expect(config.lexiconPath).toBeUndefined();
    expect(config.api.port).toBe(8000);
    expect(config.api.host).toBe('127.0.0.1');
    expect(config.api.maxUploadBytes).toBe(5 * 1024 * 1024);
    expect(config.api.allowedOrigins).toContain('http://localhost:3000');
  });

  it('reads from env vars', () => {
    process.env.PHISHLENS_MODEL_VERSION = '2.0.0';
    process.env.PHISHLENS_LOCALE = 'ar';
    process.env.PHISHLENS_API_PORT = '9100';
    process.env.ALLOWED_ORIGINS = 'https://a.example, https://b.example';

    const config = resolveConfig();
    expect(config.modelVersion).toBe('2.0.0');
    expect(config.locale).toBe('ar');
    expect(config.api.port).toBe(9100);
    expect(config.api.allowedOrigins).toEqual(['https://a.example', 'https://b.example']);
  });

  it('falls back on unparsable numbers and unknown locales', () => {
    process.env.PHISHLENS_API_PORT = 'abc';
    process.env.PHISHLENS_LOCALE = 'fr';

    const config = resolveConfig();
    expect(config.api.port).toBe(8000);
    expect(config.locale).toBe('en');
  });

  it('merges the config file over env vars', () => {
    const path = join(dir, 'config.json');
    writeFileSync(path, JSON.stringify({ modelVersion: 'file-model', api: { port: 7000 } }));
    process.env.PHISHLENS_CONFIG = path;
    process.env.PHISHLENS_API_HOST = '0.0.0.0';

    const config = resolveConfig();
    expect(config.modelVersion).toBe('file-model');
    expect(config.api.port).toBe(7000);
    expect(config.api.host).toBe('0.0.0.0');
  });

  it('ignores a malformed config file with a warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const path = join(dir, 'config.json');
    writeFileSync(path, '{ broken');
    process.env.PHISHLENS_CONFIG = path;

    const config = resolveConfig();
    expect(config.modelVersion).toBe('0.1.0-ml');
    expect(warn).toHaveBeenCalledWith('[phishlens] Ignoring malformed config file:', path);
  });

  it('applies explicit overrides last', () => {
    process.env.PHISHLENS_API_PORT = '4000';

    const config = resolveConfig({ api: { port: 5000, host: '0.0.0.0' } });
    expect(config.api.port).toBe(5000);
    expect(config.api.host).toBe('0.0.0.0');
    expect(config.api.maxUploadBytes).toBe(5 * 1024 * 1024);
  });
});
