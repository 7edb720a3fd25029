import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { CONFIG_FILE_NAME, DEFAULT_CONFIG } from './defaults.js';
import type { TsrfConfig, PartialConfig } from './types.js';
import { LOG_LEVELS, type LogLevel } from '../shared/Logger.js';

export type { TsrfConfig } from './types.js';

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const configSchema = z.object({
  version: z.literal(1),
  tsconfig: z.string().min(1),
  format: z.object({
    indentSize: z.number().int().nonnegative(),
    tabSize: z.number().int().positive(),
    convertTabsToSpaces: z.boolean(),
    newLineCharacter: z.enum(['\n', '\r\n']),
    semicolons: z.enum(['ignore', 'insert', 'remove']),
  }),
  logLevel: logLevelSchema,
});

/** 檔案中的設定允許省略任意欄位 */
const fileSchema = configSchema.deepPartial();

/** 深層合併：partial 覆蓋 base（只處理一層巢狀物件） */
function merge(base: TsrfConfig, partial: PartialConfig): TsrfConfig {
  return {
    ...base,
    ...stripUndefined(partial),
    format: { ...base.format, ...stripUndefined(partial.format ?? {}) },
  };
}

function stripUndefined<T extends object>(obj: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(obj) as (keyof T)[]) {
    if (obj[key] !== undefined) result[key] = obj[key];
  }
  return result;
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/** 環境變數覆蓋 config：TSRF_LOG_LEVEL → logLevel */
function applyEnvOverrides(config: TsrfConfig): TsrfConfig {
  const level = process.env.TSRF_LOG_LEVEL;
  if (level && isLogLevel(level)) {
    return { ...config, logLevel: level };
  }
  return config;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    .join('; ');
}

/** 讀取 .tsrf.json；檔案不存在時回傳空設定 */
function readConfigFile(repoRoot: string): PartialConfig {
  const configPath = path.join(repoRoot, CONFIG_FILE_NAME);
  if (!fs.existsSync(configPath)) return {};

  const raw: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  const parsed = fileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`invalid config: ${CONFIG_FILE_NAME}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * 載入設定：讀取 .tsrf.json（若存在）並合併到預設值上
 * @param repoRoot - workspace 根目錄
 * @param overrides - 程式碼層級的覆蓋值（優先於檔案）
 */
export function loadConfig(
  repoRoot: string,
  overrides?: PartialConfig,
): TsrfConfig {
  // 合併順序：defaults < file config < overrides < env
  let merged = merge(DEFAULT_CONFIG, readConfigFile(repoRoot));
  if (overrides) {
    merged = merge(merged, overrides);
  }
  merged = applyEnvOverrides(merged);

  const checked = configSchema.safeParse(merged);
  if (!checked.success) {
    throw new Error(`invalid config: ${describeIssues(checked.error)}`);
  }
  return checked.data;
}
