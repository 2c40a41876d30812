import { readFile, writeFile, mkdir, rename } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { randomUUID } from 'node:crypto';
import {
  DeskwireConfigSchema,
  UPDATE_FIELDS,
  UPDATE_FIELD_PATHS,
  type ConfigUpdate,
  type DeskwireConfig,
} from './schema.js';
import { ConfigError, ValidationError, errorMessage } from '../errors.js';
import { isRecord } from '../utils/guards.js';
import * as log from '../utils/logger.js';

export const DEFAULT_CONFIG_FILE = 'deskwire.json';

export type Env = Record<string, string | undefined>;

export interface ConfigProvider {
  /** Latest configuration, read from the backing store on every call. */
  get(): Promise<DeskwireConfig>;
  /** Merge the given fields into the store and return the resulting config. */
  update(fields: ConfigUpdate): Promise<DeskwireConfig>;
}

export function resolveConfigPath(env: Env = process.env): string {
  return resolve(env.DESKWIRE_CONFIG || DEFAULT_CONFIG_FILE);
}

/**
 * Config backed by a JSON file plus environment variables.
 * Priority: defaults < env vars < deskwire.json
 *
 * The file is the administrative store, so a value written by update() is
 * never shadowed by the environment. Nothing is cached between calls.
 */
export class FileConfigProvider implements ConfigProvider {
  readonly path: string;
  private env: Env;
  private writeChain: Promise<unknown> = Promise.resolve();

  constructor(opts: { path?: string; env?: Env } = {}) {
    this.env = opts.env ?? process.env;
    this.path = opts.path ?? resolveConfigPath(this.env);
  }

  async get(): Promise<DeskwireConfig> {
    const fileConfig = await loadJSON(this.path);
    return parseConfig(deepMerge(loadEnvVars(this.env), fileConfig), this.path);
  }

  update(fields: ConfigUpdate): Promise<DeskwireConfig> {
    // Serialize writers; a failed update must not block the next one.
    const next = this.writeChain.then(() => this.applyUpdate(fields));
    this.writeChain = next.catch(() => undefined);
    return next;
  }

  private async applyUpdate(fields: ConfigUpdate): Promise<DeskwireConfig> {
    const patch: Record<string, unknown> = {};
    const changed: string[] = [];

    for (const field of UPDATE_FIELDS) {
      const value = fields[field];
      if (typeof value !== 'string' || !value.trim()) continue;
      const [section, key] = UPDATE_FIELD_PATHS[field];
      const current = patch[section];
      patch[section] = deepMerge(isRecord(current) ? current : {}, { [key]: value });
      changed.push(field);
    }

    if (changed.length === 0) {
      throw new ValidationError(`No recognized fields to update. Expected one of: ${UPDATE_FIELDS.join(', ')}`);
    }

    const existing = await loadJSON(this.path);
    const merged = deepMerge(existing, patch);
    const config = parseConfig(deepMerge(loadEnvVars(this.env), merged), this.path);

    await writeAtomic(this.path, JSON.stringify(merged, null, 2) + '\n');
    log.info(`Config updated (${changed.join(', ')}) in ${this.path}`);

    return config;
  }
}

/** Maps the recognised environment variables onto the config shape; blank values are skipped. */
function loadEnvVars(env: Env): Record<string, unknown> {
  const pick = (key: string): string | undefined => {
    const value = env[key];
    return value !== undefined && value.trim() !== '' ? value : undefined;
  };

  const result: Record<string, unknown> = {};

  const chatwoot = compact({
    baseUrl: pick('CHATWOOT_BASE_URL'),
    apiToken: pick('CHATWOOT_API_TOKEN'),
    accountId: pick('CHATWOOT_ACCOUNT_ID'),
  });
  if (chatwoot) result.chatwoot = chatwoot;

  const inference = compact({
    provider: pick('INFERENCE_PROVIDER'),
    endpoint: pick('OLLAMA_ENDPOINT'),
    model: pick('LLM_MODEL'),
    apiKey: pick('INFERENCE_API_KEY'),
    systemMessage: pick('SYSTEM_MESSAGE'),
  });
  if (inference) result.inference = inference;

  const maxMessages = envNumber('HISTORY_MAX_MESSAGES', pick('HISTORY_MAX_MESSAGES'));
  if (maxMessages !== undefined) result.history = { maxMessages };

  const port = envNumber('PORT', pick('PORT'));
  if (port !== undefined) result.server = { port };

  const logLevel = pick('LOG_LEVEL');
  if (logLevel) result.logLevel = logLevel;

  return result;
}

function compact(values: Record<string, string | undefined>): Record<string, string> | undefined {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) result[key] = value;
  }
  return Object.keys(result).length > 0 ? result : undefined;
}

function envNumber(key: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

function parseConfig(raw: Record<string, unknown>, source: string): DeskwireConfig {
  const parsed = DeskwireConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration (${source}): ${issues}`);
  }
  return parsed.data;
}

async function loadJSON(path: string): Promise<Record<string, unknown>> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) return {};
    throw new ConfigError(`Cannot read ${path}: ${errorMessage(err)}`, { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new ConfigError(`${path} is not valid JSON: ${errorMessage(err)}`, { cause: err });
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(`${path} must contain a JSON object`);
  }
  return parsed;
}

async function writeAtomic(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = `${path}.${randomUUID()}.tmp`;
  await writeFile(tmp, content, 'utf-8');
  await rename(tmp, path);
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export function deepMerge(...objects: Record<string, unknown>[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const obj of objects) {
    for (const [key, value] of Object.entries(obj)) {
      const current = result[key];
      if (isRecord(value) && isRecord(current)) {
        result[key] = deepMerge(current, value);
      } else if (value !== undefined) {
        result[key] = value;
      }
    }
  }
  return result;
}
