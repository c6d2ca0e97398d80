import { promises as fs } from 'node:fs';
import { Command, CommanderError } from 'commander';
import AjvModule from 'ajv';
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';
import { config as loadEnv } from 'dotenv';
import { ConfigError } from './errors.js';
import { isLogLevel } from './log.js';
import type { FetchConfig, ScanConfig } from './types.js';

const Ajv = AjvModule.default;

const DEFAULTS_URL = new URL('../config/scan.defaults.json', import.meta.url);
const SCHEMA_URL = new URL('../config/schemas/scan.defaults.schema.json', import.meta.url);

type CliOptions = {
  url?: string;
  timeout?: number;
  maxRedirects?: number;
  maxBytes?: number;
  userAgent?: string;
  snippetLength?: number;
  logLevel?: string;
};

function int(value: string): number {
  return /^-?\d+$/.test(value.trim()) ? Number.parseInt(value, 10) : Number.NaN;
}

function envNum(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const v = int(raw);
  if (!Number.isFinite(v)) throw new ConfigError(`Invalid ${name}`, [`expected an integer, got "${raw}"`]);
  return v;
}

function describe(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`);
}

async function readJson(url: URL): Promise<unknown> {
  const raw = await fs.readFile(url, 'utf-8');
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (e) {
    throw new ConfigError(`Cannot parse ${url.pathname}`, [e instanceof Error ? e.message : String(e)]);
  }
}

async function compileSchema(): Promise<ValidateFunction<ScanConfig>> {
  const schema = await readJson(SCHEMA_URL);
  if (typeof schema !== 'object' || schema === null || Array.isArray(schema)) {
    throw new ConfigError('Config schema must be a JSON object');
  }
  const schemaObject: SchemaObject = { ...schema };
  const ajv = new Ajv({ allErrors: true });
  return ajv.compile<ScanConfig>(schemaObject);
}

function parseFlags(argv: string[]): CliOptions {
  const program = new Command();
  program
    .allowUnknownOption(true)
    .exitOverride()
    .configureOutput({ writeErr: () => {} })
    .option('--url <url>')
    .option('--timeout <ms>', 'request timeout in milliseconds', int)
    .option('--max-redirects <n>', 'redirects to follow', int)
    .option('--max-bytes <n>', 'response body limit', int)
    .option('--user-agent <ua>')
    .option('--snippet-length <n>', 'characters kept from element markup', int)
    .option('--log-level <level>');
  try {
    program.parse(argv, { from: 'user' });
  } catch (e) {
    if (e instanceof CommanderError) throw new ConfigError('Invalid command line', [e.message]);
    throw e;
  }
  return program.opts<CliOptions>();
}

/**
 * Layers configuration: packaged defaults, then environment (`SCAN_*`,
 * `LOG_LEVEL`, optionally from `.env`), then command-line flags. The merged
 * result is validated against the same schema as the defaults.
 *
 * Pass `env` explicitly to keep `.env` and `process.env` out of the picture.
 */
export async function loadConfig(argv: string[] = process.argv.slice(2), env?: NodeJS.ProcessEnv): Promise<ScanConfig> {
  let source = env;
  if (!source) {
    loadEnv();
    source = process.env;
  }

  const validate = await compileSchema();
  const defaults = await readJson(DEFAULTS_URL);
  if (!validate(defaults)) {
    throw new ConfigError('Invalid defaults config', describe(validate.errors));
  }

  const fetch: FetchConfig = { ...defaults.fetch };
  const config: ScanConfig = { ...defaults, fetch };

  const timeout = envNum(source, 'SCAN_TIMEOUT_MS');
  if (timeout !== undefined) fetch.timeoutMs = timeout;
  const redirects = envNum(source, 'SCAN_MAX_REDIRECTS');
  if (redirects !== undefined) fetch.maxRedirects = redirects;
  const bytes = envNum(source, 'SCAN_MAX_BYTES');
  if (bytes !== undefined) fetch.maxBytes = bytes;
  if (source.SCAN_USER_AGENT) fetch.userAgent = source.SCAN_USER_AGENT;
  const snippet = envNum(source, 'SCAN_SNIPPET_LENGTH');
  if (snippet !== undefined) config.snippetLength = snippet;
  if (source.LOG_LEVEL) {
    const level = source.LOG_LEVEL.trim().toLowerCase();
    if (!isLogLevel(level)) throw new ConfigError('Invalid LOG_LEVEL', [`unknown level "${source.LOG_LEVEL}"`]);
    config.logLevel = level;
  }

  const opts = parseFlags(argv);
  if (opts.url) config.url = opts.url;
  if (opts.timeout !== undefined) fetch.timeoutMs = opts.timeout;
  if (opts.maxRedirects !== undefined) fetch.maxRedirects = opts.maxRedirects;
  if (opts.maxBytes !== undefined) fetch.maxBytes = opts.maxBytes;
  if (opts.userAgent) fetch.userAgent = opts.userAgent;
  if (opts.snippetLength !== undefined) config.snippetLength = opts.snippetLength;
  if (opts.logLevel) {
    const level = opts.logLevel.trim().toLowerCase();
    if (!isLogLevel(level)) throw new ConfigError('Invalid --log-level', [`unknown level "${opts.logLevel}"`]);
    config.logLevel = level;
  }

  if (!validate(config)) {
    throw new ConfigError('Invalid configuration', describe(validate.errors));
  }
  return config;
}
