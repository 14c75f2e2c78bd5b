import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import type { ThermometerModel } from '../interfaces/thermometer-model.js';
import { findModel } from '../models/index.js';
import { parseBleDriver } from '../transport/index.js';
import type { BleDriver, Locator } from '../transport/types.js';
import { errMsg } from '../utils/error.js';
import { AppConfigSchema, formatConfigError, type AppConfig } from './schema.js';

const __dirname: string = dirname(fileURLToPath(import.meta.url));
export const DEFAULT_CONFIG_PATH: string = join(__dirname, '..', '..', 'config.yaml');

type Env = Record<string, string | undefined>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function envValue(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Replace `${VAR}` references in every string value with the environment value.
 * A reference to an unset variable is a configuration error.
 */
export function resolveEnvReferences(value: unknown, env: Env = process.env): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_match, name: string) => {
      const resolved = env[name];
      if (resolved === undefined) {
        throw new ConfigError(`Environment variable ${name} is referenced in config but not set`);
      }
      return resolved;
    });
  }
  if (Array.isArray(value)) return value.map((v) => resolveEnvReferences(v, env));
  if (isRecord(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, resolveEnvReferences(v, env)]),
    );
  }
  return value;
}

/** TP90X_ADDRESS, TP90X_NAME, TP90X_MODEL and NOBLE_DRIVER take precedence over the file. */
export function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: Env = process.env,
): Record<string, unknown> {
  const device: Record<string, unknown> = isRecord(raw.device) ? { ...raw.device } : {};
  const ble: Record<string, unknown> = isRecord(raw.ble) ? { ...raw.ble } : {};

  const address = envValue(env, 'TP90X_ADDRESS');
  const name = envValue(env, 'TP90X_NAME');
  const model = envValue(env, 'TP90X_MODEL');
  const driver = envValue(env, 'NOBLE_DRIVER');

  if (address) device.address = address;
  if (name) device.name = name;
  if (model) device.model = model.toLowerCase();
  if (driver) ble.noble_driver = parseBleDriver(driver) ?? driver;

  return { ...raw, device, ble };
}

/** Validate an already-parsed document. Throws ConfigError with one entry per issue. */
export function parseConfig(raw: unknown, env: Env = process.env, source?: string): AppConfig {
  if (raw === null || raw === undefined) raw = {};
  if (!isRecord(raw)) {
    throw new ConfigError(`${source ?? 'Config'} is not a YAML mapping`);
  }

  const resolved = resolveEnvReferences(applyEnvOverrides(raw, env), env);
  const result = AppConfigSchema.safeParse(resolved);
  if (!result.success) {
    throw new ConfigError(formatConfigError(result.error, source));
  }
  return result.data;
}

/**
 * Load config.yaml (or `TP90X_CONFIG`). A missing default file yields the
 * defaults plus environment overrides; a missing explicit path is an error.
 */
export function loadConfig(path?: string, env: Env = process.env): AppConfig {
  const explicit = path ?? envValue(env, 'TP90X_CONFIG');
  const configPath = explicit ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    if (explicit) throw new ConfigError(`Config file not found: ${configPath}`);
    return parseConfig({ version: 1 }, env, 'environment');
  }

  let doc: unknown;
  try {
    doc = parseYaml(readFileSync(configPath, 'utf8'));
  } catch (err) {
    throw new ConfigError(`Cannot read ${configPath}: ${errMsg(err)}`);
  }
  return parseConfig(doc, env, configPath);
}

export interface ResolvedTarget {
  model: ThermometerModel;
  locator: Locator;
  driver: BleDriver | null;
}

/** Turn the device section into what the connect step needs. */
export function resolveTarget(config: AppConfig): ResolvedTarget {
  const model = findModel(config.device.model);
  const locator = model.locate({
    address: config.device.address ?? undefined,
    name: config.device.name ?? undefined,
  });
  return { model, locator, driver: config.ble.noble_driver ?? null };
}
