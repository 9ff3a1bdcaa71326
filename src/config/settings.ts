/**
 * Run Settings
 *
 * Resolved from four layers, later ones winning:
 *   1. built-in defaults
 *   2. JSON config file (translator.config.json in the working directory, or --config)
 *   3. environment (DIFY_API_KEY, DIFY_API_URL, DIFY_USER; .env is loaded by the CLI)
 *   4. command-line flags
 */

import * as fs from 'fs';
import * as path from 'path';
import { ResponseMode } from '../core/types';
import { ConfigurationError } from '../core/errors';
import { log, errorMessage } from '../logging/logger';
import { DEFAULT_TRANSLATABLE_EXTENSIONS } from '../files/scan';
import {
  DEFAULT_CONTINUE_QUERY,
  DEFAULT_MAX_OUTPUT_TOKENS,
  DEFAULT_MAX_TURNS,
  DEFAULT_QUERY,
} from '../dify/translator';

export const DEFAULT_API_URL = 'https://api.dify.ai/v1/chat-messages';
export const DEFAULT_CONFIG_FILE = 'translator.config.json';
export const LEDGER_FILE = 'metadata.json';
export const RUN_LEDGER_FILE = 'metadata.run.json';

export interface Settings {
  source: string;
  target: string;
  targetLanguage: string;
  apiKey: string;
  apiUrl: string;
  user: string;
  query: string;
  continueQuery: string;
  responseMode: ResponseMode;
  workers: number;
  maxOutputTokens: number;
  maxTurns: number;
  /** Blacklist file, or null for none */
  blacklist: string | null;
  /** Directory holding both ledgers (defaults to the source directory) */
  stateDir: string;
  logFile: string | null;
  extensions: string[];
}

/**
 * Raw values as they arrive from the command line; all optional.
 * A type alias so commander's `opts<T>()` accepts it.
 */
export type CliOptions = {
  source?: string;
  target?: string;
  targetLanguage?: string;
  apiKey?: string;
  apiUrl?: string;
  user?: string;
  query?: string;
  continueQuery?: string;
  responseMode?: string;
  workers?: string;
  maxOutputTokens?: string;
  maxTurns?: string;
  blacklist?: string;
  stateDir?: string;
  logFile?: string;
  extensions?: string;
  config?: string;
};

/** Config file keys accepted; values are checked individually */
type FileSettings = Partial<Record<keyof Settings, unknown>>;

const DEFAULT_RESPONSE_MODE: ResponseMode = 'streaming';

const DEFAULTS = {
  apiUrl: DEFAULT_API_URL,
  user: 'doc-translator',
  query: DEFAULT_QUERY,
  continueQuery: DEFAULT_CONTINUE_QUERY,
  responseMode: DEFAULT_RESPONSE_MODE,
  workers: 4,
  maxOutputTokens: DEFAULT_MAX_OUTPUT_TOKENS,
  maxTurns: DEFAULT_MAX_TURNS,
  logFile: 'translation.log',
  extensions: DEFAULT_TRANSLATABLE_EXTENSIONS,
};

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load the JSON config file. An explicitly named file must exist; the
 * default one is optional.
 */
export function loadConfigFile(configPath: string | undefined, cwd: string): FileSettings {
  const explicit = configPath !== undefined;
  const filePath = path.resolve(cwd, configPath ?? DEFAULT_CONFIG_FILE);

  if (!fs.existsSync(filePath)) {
    if (explicit) {
      throw new ConfigurationError(`Config file not found: ${filePath}`);
    }
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Failed to load config ${filePath}: ${errorMessage(error)}`);
  }

  if (!isObject(parsed)) {
    throw new ConfigurationError(`Config ${filePath} must contain a JSON object`);
  }

  log(`[Config] Loaded ${filePath}`);
  return parsed;
}

function fileString(settings: FileSettings, key: keyof Settings): string | undefined {
  const value = settings[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ConfigurationError(`Config value "${key}" must be a string`);
  }
  return value;
}

function fileInteger(settings: FileSettings, key: keyof Settings): string | undefined {
  const value = settings[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number') {
    throw new ConfigurationError(`Config value "${key}" must be a number`);
  }
  return String(value);
}

function fileList(settings: FileSettings, key: keyof Settings): string | undefined {
  const value = settings[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value) || !value.every(item => typeof item === 'string')) {
    throw new ConfigurationError(`Config value "${key}" must be an array of strings`);
  }
  return value.join(',');
}

function parsePositiveInteger(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function parseResponseMode(raw: string | undefined): ResponseMode {
  if (raw === undefined) {
    return DEFAULTS.responseMode;
  }
  if (raw === 'streaming' || raw === 'blocking') {
    return raw;
  }
  throw new ConfigurationError(`Response mode must be "streaming" or "blocking", got "${raw}"`);
}

/**
 * Split a comma-separated extension list, adding the leading dot if missing
 */
export function parseExtensions(raw: string | undefined): string[] {
  if (raw === undefined) {
    return [...DEFAULTS.extensions];
  }
  const extensions = raw
    .split(',')
    .map(ext => ext.trim())
    .filter(ext => ext.length > 0)
    .map(ext => (ext.startsWith('.') ? ext : `.${ext}`));
  if (extensions.length === 0) {
    throw new ConfigurationError('At least one translatable extension is required');
  }
  return extensions;
}

function isDirectory(dir: string): boolean {
  return fs.statSync(dir, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

function required(name: string, value: string | undefined): string {
  if (!value) {
    throw new ConfigurationError(`Missing required setting: ${name}`);
  }
  return value;
}

/**
 * Resolve settings from every layer.
 * @throws ConfigurationError on a missing credential, a missing source
 *   directory or an invalid value
 */
export function resolveSettings(
  cli: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): Settings {
  const file = loadConfigFile(cli.config, cwd);

  const source = required('source', cli.source ?? fileString(file, 'source'));
  const target = required('target', cli.target ?? fileString(file, 'target'));
  const targetLanguage = required('target language', cli.targetLanguage ?? fileString(file, 'targetLanguage'));

  const apiKey = cli.apiKey ?? env.DIFY_API_KEY ?? fileString(file, 'apiKey');
  if (!apiKey) {
    throw new ConfigurationError(
      'API key must be provided either through --api-key or the DIFY_API_KEY environment variable'
    );
  }

  const sourceRoot = path.resolve(cwd, source);
  if (!isDirectory(sourceRoot)) {
    throw new ConfigurationError(`Source directory does not exist: ${sourceRoot}`);
  }
  const stateDir = cli.stateDir ?? fileString(file, 'stateDir');
  const blacklist = cli.blacklist ?? fileString(file, 'blacklist');
  const logFile = cli.logFile ?? fileString(file, 'logFile') ?? DEFAULTS.logFile;

  return {
    source: sourceRoot,
    target: path.resolve(cwd, target),
    targetLanguage,
    apiKey,
    apiUrl: cli.apiUrl ?? env.DIFY_API_URL ?? fileString(file, 'apiUrl') ?? DEFAULTS.apiUrl,
    user: cli.user ?? env.DIFY_USER ?? fileString(file, 'user') ?? DEFAULTS.user,
    query: cli.query ?? fileString(file, 'query') ?? DEFAULTS.query,
    continueQuery: cli.continueQuery ?? fileString(file, 'continueQuery') ?? DEFAULTS.continueQuery,
    responseMode: parseResponseMode(cli.responseMode ?? fileString(file, 'responseMode')),
    workers: parsePositiveInteger('Worker count', cli.workers ?? fileInteger(file, 'workers'), DEFAULTS.workers),
    maxOutputTokens: parsePositiveInteger(
      'Max output tokens',
      cli.maxOutputTokens ?? fileInteger(file, 'maxOutputTokens'),
      DEFAULTS.maxOutputTokens
    ),
    maxTurns: parsePositiveInteger('Max turns', cli.maxTurns ?? fileInteger(file, 'maxTurns'), DEFAULTS.maxTurns),
    blacklist: blacklist ? path.resolve(cwd, blacklist) : null,
    stateDir: stateDir ? path.resolve(cwd, stateDir) : sourceRoot,
    logFile: logFile ? path.resolve(cwd, logFile) : null,
    extensions: parseExtensions(cli.extensions ?? fileList(file, 'extensions')),
  };
}

export function ledgerPaths(settings: Settings): { ledger: string; runLedger: string } {
  return {
    ledger: path.join(settings.stateDir, LEDGER_FILE),
    runLedger: path.join(settings.stateDir, RUN_LEDGER_FILE),
  };
}
