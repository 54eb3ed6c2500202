/**
 * Configuration
 *
 * Builds one explicit AppConfig from the environment, an optional YAML
 * file and CLI overrides (in increasing precedence). Nothing past this
 * module reads process.env.
 */

import { readFileSync } from 'fs';
import yaml from 'js-yaml';
import { ZodError, z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';
import { DEFAULT_GROUPING_POLICY, mergePolicy } from './lrc/grouper.js';
import { SPEECH_MODELS } from './types.js';
import type { GroupingPolicy, LogLevel, SpeechModel } from './types.js';

export const DEFAULT_BASE_URL = 'https://api.assemblyai.com/v2';

export interface AppConfig {
  apiKey?: string;
  baseUrl: string;
  model: SpeechModel;
  pollIntervalMs: number;
  timeoutMs: number;
  logLevel: LogLevel;
  logDir?: string;
  grouping: GroupingPolicy;
}

export interface ConfigOverrides {
  model?: string;
  timeoutSeconds?: number;
  pollIntervalMs?: number;
  grouping?: Partial<GroupingPolicy>;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  configFile?: string;
  overrides?: ConfigOverrides;
}

const blank = (value: unknown) => (value === '' ? undefined : value);

const optionalString = z.preprocess(blank, z.string().trim().min(1).optional());
const optionalPositiveInt = z.preprocess(blank, z.coerce.number().int().positive().optional());

const envSchema = z.object({
  ASSEMBLYAI_API_KEY: optionalString,
  AAI_API_KEY: optionalString,
  ASSEMBLYAI_BASE_URL: z.preprocess(blank, z.string().url().optional()),
  LRCSCRIBE_MODEL: optionalString,
  LRCSCRIBE_POLL_INTERVAL_MS: optionalPositiveInt,
  LRCSCRIBE_TIMEOUT_SECONDS: optionalPositiveInt,
  LRCSCRIBE_LOG_DIR: optionalString,
  LOG_LEVEL: z.preprocess(blank, z.enum(['error', 'warn', 'info', 'debug']).optional()),
});

const groupingSchema = z.object({
  maxWordsPerLine: z.number().int().positive().optional(),
  maxGapMs: z.number().int().nonnegative().nullable().optional(),
  sentenceBoundary: z.boolean().optional(),
}).strict();

const fileSchema = z.object({
  model: z.string().optional(),
  timeoutSeconds: z.number().int().positive().optional(),
  pollIntervalMs: z.number().int().positive().optional(),
  grouping: groupingSchema.optional(),
}).strict();

type FileConfig = z.infer<typeof fileSchema>;

function describe(error: ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

function parseWith<S extends z.ZodTypeAny>(schema: S, raw: unknown, source: string): z.infer<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid ${source}: ${describe(result.error)}`, { cause: result.error });
  }
  return result.data;
}

export function readConfigFile(path: string): FileConfig {
  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${path}: ${errorMessage(error)}`, { cause: error });
  }
  // An empty YAML document loads as undefined
  return parseWith(fileSchema, raw ?? {}, `config file ${path}`);
}

export function parseModel(value: string): SpeechModel {
  const model = SPEECH_MODELS.find(m => m === value);
  if (!model) {
    throw new ConfigError(`Invalid model '${value}'. Allowed: ${SPEECH_MODELS.join(', ')}`);
  }
  return model;
}

export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = parseWith(envSchema, options.env ?? process.env, 'environment');
  const file: FileConfig = options.configFile ? readConfigFile(options.configFile) : {};
  const overrides = options.overrides ?? {};

  const timeoutSeconds = overrides.timeoutSeconds ?? file.timeoutSeconds ?? env.LRCSCRIBE_TIMEOUT_SECONDS ?? 300;
  if (!Number.isInteger(timeoutSeconds) || timeoutSeconds <= 0) {
    throw new ConfigError(`Timeout must be a positive number of seconds, got ${timeoutSeconds}`);
  }

  const pollIntervalMs = overrides.pollIntervalMs ?? file.pollIntervalMs ?? env.LRCSCRIBE_POLL_INTERVAL_MS ?? 3000;
  if (!Number.isInteger(pollIntervalMs) || pollIntervalMs <= 0) {
    throw new ConfigError(`Poll interval must be a positive number of milliseconds, got ${pollIntervalMs}`);
  }

  return {
    apiKey: env.ASSEMBLYAI_API_KEY ?? env.AAI_API_KEY,
    baseUrl: (env.ASSEMBLYAI_BASE_URL ?? DEFAULT_BASE_URL).replace(/\/+$/, ''),
    model: parseModel(overrides.model ?? file.model ?? env.LRCSCRIBE_MODEL ?? 'universal'),
    pollIntervalMs,
    timeoutMs: timeoutSeconds * 1000,
    logLevel: env.LOG_LEVEL ?? 'info',
    logDir: env.LRCSCRIBE_LOG_DIR,
    grouping: mergePolicy(mergePolicy(DEFAULT_GROUPING_POLICY, file.grouping), overrides.grouping),
  };
}

export function requireApiKey(config: AppConfig): string {
  if (!config.apiKey) {
    throw new ConfigError('ASSEMBLYAI_API_KEY is not set. Export it or add it to .env');
  }
  return config.apiKey;
}
