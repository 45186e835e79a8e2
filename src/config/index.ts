import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../util/errors.js';

const configSchema = z.object({
  cardStyle: z.enum(['word', 'symbol', 'unicode']).default('symbol'),
  seed: z.number().int().min(0).optional(),
  banner: z.boolean().default(true),
  logLevel: z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
}).strict();

export type AppConfig = z.infer<typeof configSchema>;

export type ConfigSources = {
  file?: string;
  env?: NodeJS.ProcessEnv;
  argv?: readonly string[];
};

type Layer = Record<string, unknown>;

export const CONFIG_FILE = path.resolve(process.cwd(), 'config', 'config.json');

let cfg: AppConfig | null = null;

// For testing: reset the cache
export function resetConfigCache() {
  cfg = null;
}

function isRecord(v: unknown): v is Layer {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function fromFile(file: string): Layer {
  if (!fs.existsSync(file)) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (err) {
    throw new ConfigError(`Could not read ${file}`, [errorMessage(err)]);
  }
  if (!isRecord(parsed)) throw new ConfigError(`${file} must contain a JSON object`);
  return parsed;
}

function bannerFlag(v: string): boolean {
  return !(v === 'off' || v === '0' || v === 'false');
}

function fromEnv(env: NodeJS.ProcessEnv): Layer {
  const out: Layer = {};
  if (env.BJ_CARD_STYLE) out.cardStyle = env.BJ_CARD_STYLE.toLowerCase();
  if (env.BJ_SEED) out.seed = Number(env.BJ_SEED);
  if (env.CLI_BANNER) out.banner = bannerFlag(env.CLI_BANNER);
  if (env.LOG_LEVEL) out.logLevel = env.LOG_LEVEL.toLowerCase();
  return out;
}

function argValue(argv: readonly string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  const hit = argv.find((a) => a.startsWith(prefix));
  return hit === undefined ? undefined : hit.slice(prefix.length);
}

function fromArgv(argv: readonly string[]): Layer {
  const out: Layer = {};
  const style = argValue(argv, 'style');
  if (style !== undefined) out.cardStyle = style.toLowerCase();
  const seed = argValue(argv, 'seed');
  if (seed !== undefined) out.seed = Number(seed);
  const banner = argValue(argv, 'banner');
  if (banner !== undefined) out.banner = bannerFlag(banner);
  return out;
}

export function parseConfig(raw: unknown): AppConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError('Invalid configuration', issues);
  }
  return result.data;
}

/** File, then environment, then argv; later sources win. */
export function loadConfig(sources: ConfigSources = {}): AppConfig {
  const merged = {
    ...fromFile(sources.file ?? CONFIG_FILE),
    ...fromEnv(sources.env ?? process.env),
    ...fromArgv(sources.argv ?? process.argv.slice(2)),
  };
  cfg = parseConfig(merged);
  return cfg;
}

export function getConfig(): AppConfig {
  return cfg ?? loadConfig();
}
