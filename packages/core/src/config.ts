import { existsSync, readFileSync } from 'node:fs';
import { isLocale } from './mail/messages.js';
import type { Locale } from './mail/types.js';

export interface PhishLensConfig {
  modelVersion: string;
  locale: Locale;
  /** JSON lexicon replacing the built-in phrase and domain lists */
  lexiconPath?: string;
  api: {
    port: number;
    host: string;
    allowedOrigins: string[];
    maxUploadBytes: number;
  };
}

export type PhishLensConfigOverrides = Partial<Omit<PhishLensConfig, 'api'>> & {
  api?: Partial<PhishLensConfig['api']>;
};

const DEFAULT_CONFIG: PhishLensConfig = {
  modelVersion: '0.1.0-ml',
  locale: 'en',
  api: {
    port: 8000,
    host: '127.0.0.1',
    allowedOrigins: [
      'http://localhost:3000',
      'http://127.0.0.1:3000',
      'http://localhost:8000',
      'http://127.0.0.1:8000',
    ],
    maxUploadBytes: 5 * 1024 * 1024,
  },
};

function parseIntOr(value: string | undefined, fallback: number): number {
  const n = parseInt(value ?? '');
  return isNaN(n) ? fallback : n;
}

function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value.split(',').map((s) => s.trim()).filter(Boolean);
}

function pick<T>(value: T | undefined, fallback: T): T {
  return value === undefined ? fallback : value;
}

function merge(config: PhishLensConfig, overrides: PhishLensConfigOverrides): PhishLensConfig {
  const api: Partial<PhishLensConfig['api']> = overrides.api ?? {};
  return {
    modelVersion: pick(overrides.modelVersion, config.modelVersion),
    locale: pick(overrides.locale, config.locale),
    lexiconPath: pick(overrides.lexiconPath, config.lexiconPath),
    api: {
      port: pick(api.port, config.api.port),
      host: pick(api.host, config.api.host),
      allowedOrigins: pick(api.allowedOrigins, config.api.allowedOrigins),
      maxUploadBytes: pick(api.maxUploadBytes, config.api.maxUploadBytes),
    },
  };
}

/** Reads the recognised keys of a config file, ignoring anything else. */
function readFileOverrides(json: unknown): PhishLensConfigOverrides {
  if (typeof json !== 'object' || json === null) return {};
  const file: Record<string, unknown> = Object.fromEntries(Object.entries(json));
  const overrides: PhishLensConfigOverrides = {};
  if (typeof file.modelVersion === 'string') overrides.modelVersion = file.modelVersion;
  if (typeof file.locale === 'string' && isLocale(file.locale)) overrides.locale = file.locale;
  if (typeof file.lexiconPath === 'string') overrides.lexiconPath = file.lexiconPath;
  if (typeof file.api === 'object' && file.api !== null) {
    const api: Record<string, unknown> = Object.fromEntries(Object.entries(file.api));
    overrides.api = {};
    if (typeof api.port === 'number') overrides.api.port = api.port;
    if (typeof api.host === 'string') overrides.api.host = api.host;
    if (typeof api.maxUploadBytes === 'number') overrides.api.maxUploadBytes = api.maxUploadBytes;
    if (Array.isArray(api.allowedOrigins)) {
      overrides.api.allowedOrigins = api.allowedOrigins.filter((o): o is string => typeof o === 'string');
    }
  }
  return overrides;
}

/**
 * Layers defaults, environment, the optional file named by PHISHLENS_CONFIG
 * and explicit overrides, in that order.
 */
export function resolveConfig(overrides?: PhishLensConfigOverrides): PhishLensConfig {
  const env = process.env;
  const locale = env.PHISHLENS_LOCALE;
  let config: PhishLensConfig = {
    modelVersion: env.PHISHLENS_MODEL_VERSION ?? DEFAULT_CONFIG.modelVersion,
    locale: locale && isLocale(locale) ? locale : DEFAULT_CONFIG.locale,
    lexiconPath: env.PHISHLENS_LEXICON || undefined,
    api: {
      port: parseIntOr(env.PHISHLENS_API_PORT, DEFAULT_CONFIG.api.port),
      host: env.PHISHLENS_API_HOST ?? DEFAULT_CONFIG.api.host,
      allowedOrigins: parseList(env.ALLOWED_ORIGINS) ?? DEFAULT_CONFIG.api.allowedOrigins,
      maxUploadBytes: parseIntOr(env.PHISHLENS_MAX_UPLOAD_BYTES, DEFAULT_CONFIG.api.maxUploadBytes),
    },
  };

  const configPath = env.PHISHLENS_CONFIG;
  if (configPath && existsSync(configPath)) {
    try {
      config = merge(config, readFileOverrides(JSON.parse(readFileSync(configPath, 'utf-8'))));
    } catch {
      console.warn('[phishlens] Ignoring malformed config file:', configPath);
    }
  }

  if (overrides) {
    config = merge(config, overrides);
  }

  return config;
}
