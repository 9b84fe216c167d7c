/**
 * Engine configuration
 *
 * Defaults, then an optional JSON file, then ROAMER_* environment variables,
 * then programmatic overrides. Every retry cap, timeout and budget the
 * engine uses lives here.
 */

import path from 'path';
import fs from 'fs-extra';
import { z } from 'zod';
import { ConfigError, LOG_LEVEL_NAMES, type LogLevel } from '@roamer/shared';

export const DEFAULT_CONFIG_FILE = 'roamer.config.json';

const LogLevelSchema = z.custom<LogLevel>(
  (value) => typeof value === 'string' && LOG_LEVEL_NAMES.some((level) => level === value),
  { message: `Expected one of ${LOG_LEVEL_NAMES.join(', ')}` }
);

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

export const FingerprintLevelSchema = z.enum(['text', 'attributes', 'layout', 'screen']);
export type FingerprintLevel = z.infer<typeof FingerprintLevelSchema>;

export const EngineConfigSchema = z.object({
  session: z
    .object({
      stepBudget: positiveInt.default(30),
      timeBudgetMs: positiveInt.default(300_000),
      /** Number of recent steps shown to the oracle */
      historyLength: nonNegativeInt.default(5),
      captureRetryCap: positiveInt.default(3),
      captureRetryDelayMs: nonNegativeInt.default(1000),
      waitBetweenStepsMs: nonNegativeInt.default(1000),
      launchOnStart: z.boolean().default(true),
      /** Text typed into fields when the step falls back to the default policy */
      fallbackText: z.string().default('test'),
    })
    .default({}),
  loop: z
    .object({
      /** Recent steps remembered since the last new screen */
      window: positiveInt.default(8),
      /** Visits to one screen, since the last new screen, before the oracle is warned */
      warnAt: positiveInt.default(3),
      /** Warned steps that may pass before the fallback takes over */
      forceAfterWarnings: nonNegativeInt.default(2),
    })
    .default({}),
  oracle: z
    .object({
      provider: z.enum(['google', 'openai']).default('google'),
      model: z.string().min(1).default('gemini-2.5-flash'),
      temperature: z.number().min(0).max(2).default(0.4),
      timeoutMs: positiveInt.default(60_000),
      /** Re-prompts after an invalid answer before falling back */
      invalidRetryCap: nonNegativeInt.default(2),
      /** Total endpoint attempts before the oracle is declared unavailable */
      unavailableRetryCap: positiveInt.default(3),
      backoffBaseMs: nonNegativeInt.default(1000),
      backoffFactor: z.number().min(1).default(2),
      maxElements: positiveInt.default(60),
    })
    .default({}),
  executor: z
    .object({
      driverTimeoutMs: positiveInt.default(15_000),
      timeoutRetryCap: positiveInt.default(2),
      restartSettleMs: nonNegativeInt.default(2000),
    })
    .default({}),
  graph: z
    .object({
      deadEndRetryBudget: positiveInt.default(2),
    })
    .default({}),
  fingerprint: z
    .object({
      level: FingerprintLevelSchema.default('attributes'),
    })
    .default({}),
  scheduler: z
    .object({
      wallClockMs: positiveInt.default(3_600_000),
      checkpointEvery: positiveInt.default(5),
    })
    .default({}),
  knowledge: z
    .object({
      path: z.string().min(1).nullable().default('.roamer/knowledge.jsonl'),
      wipe: z.boolean().default(false),
    })
    .default({}),
  logging: z
    .object({
      level: LogLevelSchema.default('info'),
    })
    .default({}),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(base: PlainObject, override: PlainObject): PlainObject {
  const merged: PlainObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = merged[key];
    merged[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return merged;
}

function setPath(target: PlainObject, dotted: string, value: unknown): void {
  const keys = dotted.split('.');
  let cursor = target;
  for (const key of keys.slice(0, -1)) {
    const next = cursor[key];
    if (isPlainObject(next)) {
      cursor = next;
    } else {
      const created: PlainObject = {};
      cursor[key] = created;
      cursor = created;
    }
  }
  cursor[keys[keys.length - 1]] = value;
}

const ENV_MAPPING: Array<{ name: string; path: string; numeric?: boolean }> = [
  { name: 'ROAMER_LOG_LEVEL', path: 'logging.level' },
  { name: 'ROAMER_LLM_PROVIDER', path: 'oracle.provider' },
  { name: 'ROAMER_LLM_MODEL', path: 'oracle.model' },
  { name: 'ROAMER_KNOWLEDGE_PATH', path: 'knowledge.path' },
  { name: 'ROAMER_STEP_BUDGET', path: 'session.stepBudget', numeric: true },
  { name: 'ROAMER_WALL_CLOCK_MS', path: 'scheduler.wallClockMs', numeric: true },
];

export function configFromEnv(env: NodeJS.ProcessEnv): PlainObject {
  const result: PlainObject = {};
  for (const entry of ENV_MAPPING) {
    const raw = env[entry.name];
    if (raw === undefined || raw === '') continue;
    setPath(result, entry.path, entry.numeric ? Number(raw) : raw);
  }
  return result;
}

/**
 * Validate a raw configuration object and fill in defaults.
 *
 * @throws ConfigError listing every offending path
 */
export function parseConfig(input: unknown): EngineConfig {
  const parsed = EngineConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration:\n  ${issues.join('\n  ')}`, { issues });
  }
  return parsed.data;
}

export interface LoadConfigOptions {
  /** Explicit config file; must exist when given */
  file?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: EngineConfigInput;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<EngineConfig> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  let fromFile: PlainObject = {};
  const filePath = options.file ? path.resolve(cwd, options.file) : path.join(cwd, DEFAULT_CONFIG_FILE);

  if (await fs.pathExists(filePath)) {
    let content: unknown;
    try {
      content = await fs.readJson(filePath);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Could not read config file ${filePath}: ${message}`, { file: filePath });
    }
    if (!isPlainObject(content)) {
      throw new ConfigError(`Config file ${filePath} must contain a JSON object`, { file: filePath });
    }
    fromFile = content;
  } else if (options.file) {
    throw new ConfigError(`Config file not found: ${filePath}`, { file: filePath });
  }

  const overrides: PlainObject = isPlainObject(options.overrides) ? options.overrides : {};
  const merged = deepMerge(deepMerge(fromFile, configFromEnv(env)), overrides);
  return parseConfig(merged);
}
