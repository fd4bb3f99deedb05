import * as fs from 'fs';
import * as fsPromises from 'fs/promises';
import logger from './logger';
import { DEFAULT_MARKS } from './punctuation/punctuation';
import { InvalidConfigurationError, describeValue } from './punctuation/punctuation-errors';

export type PunctuationMode = 'preserve' | 'remove';

export interface PunctuationConfig {
  marks: string;  // 需要处理的标点，每个字符算一个
  mode: PunctuationMode;  // preserve：保留并恢复；remove：直接去除
}

export const DEFAULT_PUNCTUATION_CONFIG: PunctuationConfig = {
  marks: DEFAULT_MARKS,
  mode: 'preserve',
};

const MODES: readonly PunctuationMode[] = ['preserve', 'remove'];

function isPunctuationMode(value: unknown): value is PunctuationMode {
  return typeof value === 'string' && (MODES as readonly string[]).includes(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function getConfigPath(explicitPath?: string): string | undefined {
  return explicitPath || process.env.PUNCTUATION_CONFIG_PATH || undefined;
}

/**
 * 合并顺序：默认值 -> 配置文件 -> 环境变量（PUNCTUATION_MARKS / PUNCTUATION_MODE）
 */
export function mergePunctuationConfig(
  parsed: unknown,
  env: NodeJS.ProcessEnv = process.env
): PunctuationConfig {
  const config: PunctuationConfig = { ...DEFAULT_PUNCTUATION_CONFIG };

  if (isRecord(parsed)) {
    if (parsed.marks !== undefined) {
      if (typeof parsed.marks !== 'string') {
        throw new InvalidConfigurationError('"marks" must be a string', describeValue(parsed.marks));
      }
      config.marks = parsed.marks;
    }
    if (parsed.mode !== undefined) {
      if (isPunctuationMode(parsed.mode)) {
        config.mode = parsed.mode;
      } else {
        logger.warn({ mode: parsed.mode }, 'Unknown punctuation mode in config file, keeping default');
      }
    }
  }

  if (env.PUNCTUATION_MARKS !== undefined && env.PUNCTUATION_MARKS !== '') {
    config.marks = env.PUNCTUATION_MARKS;
  }
  if (env.PUNCTUATION_MODE !== undefined && env.PUNCTUATION_MODE !== '') {
    if (isPunctuationMode(env.PUNCTUATION_MODE)) {
      config.mode = env.PUNCTUATION_MODE;
    } else {
      logger.warn({ mode: env.PUNCTUATION_MODE }, 'Unknown PUNCTUATION_MODE, ignoring');
    }
  }

  return config;
}

function parseConfigFile(raw: string, configPath: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    logger.warn({ error, configPath }, 'Failed to parse punctuation config file, using defaults');
    return undefined;
  }
}

// 同步版本（用于启动阶段，其余场景尽量使用异步版本）
export function loadPunctuationConfig(configPath?: string): PunctuationConfig {
  const resolved = getConfigPath(configPath);
  if (!resolved || !fs.existsSync(resolved)) {
    return mergePunctuationConfig(undefined);
  }
  let raw: string;
  try {
    raw = fs.readFileSync(resolved, 'utf-8');
  } catch (error) {
    logger.warn({ error, configPath: resolved }, 'Failed to read punctuation config file, using defaults');
    return mergePunctuationConfig(undefined);
  }
  return mergePunctuationConfig(parseConfigFile(raw, resolved));
}

// 异步版本（推荐使用，不阻塞）
export async function loadPunctuationConfigAsync(configPath?: string): Promise<PunctuationConfig> {
  const resolved = getConfigPath(configPath);
  if (!resolved) {
    return mergePunctuationConfig(undefined);
  }
  try {
    await fsPromises.access(resolved);
  } catch {
    // 文件不存在，使用默认配置
    return mergePunctuationConfig(undefined);
  }
  let raw: string;
  try {
    raw = await fsPromises.readFile(resolved, 'utf-8');
  } catch (error) {
    logger.warn({ error, configPath: resolved }, 'Failed to read punctuation config file, using defaults');
    return mergePunctuationConfig(undefined);
  }
  return mergePunctuationConfig(parseConfigFile(raw, resolved));
}
