// Загрузка конфигурации trag: YAML + ${ENV} + дефолты + zod.
import { readFile, access } from 'node:fs/promises';
import { resolve, join } from 'node:path';
import { homedir } from 'node:os';
import { parse as parseYaml } from 'yaml';
import { AppConfigSchema } from './schema.js';
import { defaultConfig } from './defaults.js';
import type { AppConfig } from './schema.js';

// ${ENV_VAR} внутри строковых значений.
const ENV_VAR_PATTERN = /\$\{([^}]+)\}/g;

// Имя переменной окружения с путём к конфигу.
export const CONFIG_ENV_VAR = 'TRAG_CONFIG';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

// Подставляет переменные окружения во все строки; неизвестные остаются как есть.
export function resolveEnvVars(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(ENV_VAR_PATTERN, (match, name: string) => process.env[name] ?? match);
  }

  if (Array.isArray(value)) {
    return value.map(resolveEnvVars);
  }

  if (isPlainObject(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, resolveEnvVars(item)]),
    );
  }

  return value;
}

// Deep merge: объекты сливаются рекурсивно, остальное (включая массивы) заменяется.
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];
    result[key] = isPlainObject(targetValue) && isPlainObject(sourceValue)
      ? deepMerge(targetValue, sourceValue)
      : sourceValue;
  }

  return result;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Путь к конфигу. Порядок:
 * 1. --config (файл обязан существовать);
 * 2. TRAG_CONFIG (файл обязан существовать);
 * 3. ./trag.config.yaml;
 * 4. ~/.config/trag/config.yaml.
 * null — конфиг не найден, работаем на дефолтах.
 */
export async function resolveConfigPath(configPath?: string): Promise<string | null> {
  const explicit = configPath ?? process.env[CONFIG_ENV_VAR];

  if (explicit) {
    const resolved = resolve(explicit);
    if (!(await fileExists(resolved))) {
      const origin = configPath ? 'path' : `${CONFIG_ENV_VAR} path`;
      throw new Error(`Config file not found at ${origin}: ${resolved}`);
    }
    return resolved;
  }

  const candidates = [
    resolve('trag.config.yaml'),
    join(homedir(), '.config', 'trag', 'config.yaml'),
  ];

  for (const candidate of candidates) {
    if (await fileExists(candidate)) {
      return candidate;
    }
  }

  return null;
}

// Читает, подставляет окружение, сливает с дефолтами и валидирует.
export async function loadConfig(configPath?: string): Promise<AppConfig> {
  const resolvedPath = await resolveConfigPath(configPath);
  const parsed: unknown = resolvedPath ? parseYaml(await readFile(resolvedPath, 'utf-8')) : null;

  // Пустой файл или не-объект — только дефолты.
  if (!isPlainObject(parsed)) {
    return AppConfigSchema.parse(defaultConfig);
  }

  const withEnvVars = resolveEnvVars(parsed);
  const merged = isPlainObject(withEnvVars) ? deepMerge({ ...defaultConfig }, withEnvVars) : defaultConfig;

  return AppConfigSchema.parse(merged);
}
