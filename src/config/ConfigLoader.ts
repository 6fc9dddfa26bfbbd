import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigInvalidError } from '../domain/errors/DomainErrors.js';
import { isLogLevel } from '../shared/Logger.js';
import { isPlainRecord } from '../shared/TypeGuards.js';
import { CONFIG_FILE, DEFAULT_CONFIG } from './defaults.js';
import type { MdSiftConfig, PartialConfig } from './types.js';

export type { MdSiftConfig, PartialConfig } from './types.js';

const positiveInt = (name: string) =>
  z.number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be a positive integer`)
    .positive(`${name} must be a positive integer`);

const unitInterval = (name: string) =>
  z.number().min(0, `${name} must be within [0, 1]`).max(1, `${name} must be within [0, 1]`);

const nonNegative = (name: string) => z.number().nonnegative(`${name} must not be negative`);

const configSchema: z.ZodType<MdSiftConfig> = z.object({
  version: z.number().int(),
  store: z.object({
    dir: z.string().min(1, 'store.dir must not be empty'),
  }),
  chunking: z.object({
    maxChars: positiveInt('maxChars'),
    minChars: positiveInt('minChars'),
  }).refine((c) => c.minChars <= c.maxChars, { message: 'minChars must not exceed maxChars' }),
  discovery: z.object({
    concurrency: positiveInt('concurrency'),
  }),
  embedding: z.object({
    provider: z.enum(['openai', 'none']),
    model: z.string().min(1),
    dimension: positiveInt('dimension'),
    maxBatchSize: positiveInt('maxBatchSize'),
    maxInputChars: positiveInt('maxInputChars'),
    apiKey: z.string().optional(),
    baseUrl: z.string().url('baseUrl must be a URL').optional(),
  }),
  relevance: z.object({
    topK: positiveInt('topK'),
    maxSections: positiveInt('maxSections'),
    boosts: z.object({
      fileThreshold: unitInterval('fileThreshold'),
      fileWeight: nonNegative('fileWeight'),
      neighborThreshold: unitInterval('neighborThreshold'),
      neighborBoost: nonNegative('neighborBoost'),
      parentThreshold: unitInterval('parentThreshold'),
      parentBoost: nonNegative('parentBoost'),
    }),
  }),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
  }),
});

/** 深層合併：partial 覆蓋 base；陣列與純值直接取代 */
function deepMerge(base: unknown, partial: unknown): unknown {
  if (partial === undefined) return base;
  if (!isPlainRecord(base) || !isPlainRecord(partial)) return partial;

  const result: Record<string, unknown> = { ...base };
  for (const [key, val] of Object.entries(partial)) {
    result[key] = deepMerge(base[key], val);
  }
  return result;
}

/**
 * 環境變數覆蓋：
 * - OPENAI_BASE_URL → embedding.baseUrl
 * - MDSIFT_LOG_LEVEL → logging.level
 */
function envOverrides(env: NodeJS.ProcessEnv): PartialConfig {
  const overrides: PartialConfig = {};
  if (env.OPENAI_BASE_URL) {
    overrides.embedding = { baseUrl: env.OPENAI_BASE_URL };
  }
  if (env.MDSIFT_LOG_LEVEL) {
    if (!isLogLevel(env.MDSIFT_LOG_LEVEL)) {
      throw new ConfigInvalidError(`MDSIFT_LOG_LEVEL must be one of debug, info, warn, error`);
    }
    overrides.logging = { level: env.MDSIFT_LOG_LEVEL };
  }
  return overrides;
}

function readConfigFile(configPath: string): unknown {
  if (!fs.existsSync(configPath)) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigInvalidError(`Cannot read ${configPath}: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err,
    });
  }
  if (!isPlainRecord(parsed)) {
    throw new ConfigInvalidError(`${configPath} must contain a JSON object`);
  }
  return parsed;
}

/**
 * 載入設定：讀取 .mdsift.json（若存在）並合併到預設值上
 * @param workingDir - 工作目錄
 * @param overrides - 程式碼層級的覆蓋值（優先於檔案）
 */
export function loadConfig(
  workingDir: string,
  overrides?: PartialConfig,
  env: NodeJS.ProcessEnv = process.env,
): MdSiftConfig {
  const fileConfig = readConfigFile(path.join(workingDir, CONFIG_FILE));

  // 合併順序：defaults < file config < overrides < 環境變數
  const merged = deepMerge(deepMerge(deepMerge(DEFAULT_CONFIG, fileConfig), overrides), envOverrides(env));

  const result = configSchema.safeParse(merged);
  if (!result.success) {
    const reasons = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    );
    throw new ConfigInvalidError(`Invalid config: ${reasons.join('; ')}`);
  }
  return result.data;
}

/** 快取目錄的絕對路徑 */
export function resolveStorePath(workingDir: string, config: MdSiftConfig): string {
  return path.resolve(workingDir, config.store.dir);
}
