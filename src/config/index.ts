import { z } from 'zod';
import * as fs from 'fs';
import * as path from 'path';
import { SENSITIVITY_MODES, DEFAULT_PERSONA } from '../cards/types.js';
import { CardPackError, ValidationError, errorMessage } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';

export const AnalyzerConfigSchema = z.object({
  provider: z.enum(['keyword', 'ollama', 'openai', 'anthropic']).default('keyword'),
  model: z.string().default('llama3.2'),
  temperature: z.number().min(0).max(2).default(0.1),
});

export const PackConfigSchema = z.object({
  persona: z.string().min(1).default(DEFAULT_PERSONA),
  maxCards: z.number().int().min(0).default(12),
  minRelevance: z.number().min(0).max(1).default(0.5),
  sensitivityMode: z.enum(SENSITIVITY_MODES).default('quiet'),
  useTagSearch: z.boolean().default(true),
  tagSearchLimit: z.number().int().positive().default(20),
});

export const ExtractionConfigSchema = z.object({
  // Tried in order until one returns tuples
  models: z.array(z.string()).default(['ollama:llama3.2']),
  temperature: z.number().min(0).max(2).default(0.1),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export const ConfigSchema = z.object({
  version: z.number().default(1),
  analyzer: AnalyzerConfigSchema.default({}),
  pack: PackConfigSchema.default({}),
  extraction: ExtractionConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type AnalyzerConfig = z.infer<typeof AnalyzerConfigSchema>;
export type PackConfig = z.infer<typeof PackConfigSchema>;
export type ExtractionConfig = z.infer<typeof ExtractionConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

export const CPACK_DIR = '.cpack';
export const CONFIG_FILE = 'config.json';
export const CARDS_DB = 'cards.db';

export function defaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function findProjectRoot(startDir: string = process.cwd()): string | null {
  let currentDir = path.resolve(startDir);

  while (currentDir !== path.dirname(currentDir)) {
    const cpackPath = path.join(currentDir, CPACK_DIR);
    if (fs.existsSync(cpackPath) && fs.statSync(cpackPath).isDirectory()) {
      return currentDir;
    }
    currentDir = path.dirname(currentDir);
  }

  return null;
}

export function getCpackPath(projectRoot?: string): string {
  const root = projectRoot ?? findProjectRoot();
  if (!root) {
    throw new CardPackError('Not in a cardpack project. Run `cpack init` first.', 'NOT_FOUND');
  }
  return path.join(root, CPACK_DIR);
}

export function getConfigPath(projectRoot?: string): string {
  return path.join(getCpackPath(projectRoot), CONFIG_FILE);
}

export function getCardsDbPath(projectRoot?: string): string {
  return path.join(getCpackPath(projectRoot), CARDS_DB);
}

export function loadConfig(projectRoot?: string, logger: Logger = silentLogger): Config {
  const configPath = getConfigPath(projectRoot);

  if (!fs.existsSync(configPath)) {
    return defaultConfig();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    logger.warn('Config file is not valid JSON, using defaults', { path: configPath, error: errorMessage(error) });
    return defaultConfig();
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn('Config file failed validation, using defaults', {
      path: configPath,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
    return defaultConfig();
  }

  return parsed.data;
}

export function saveConfig(config: Config, projectRoot?: string): void {
  const configPath = getConfigPath(projectRoot);
  fs.writeFileSync(configPath, JSON.stringify(config, null, 2), { mode: 0o600 });
}

export function initProject(targetDir: string = process.cwd(), force: boolean = false): string {
  const cpackPath = path.join(targetDir, CPACK_DIR);

  if (fs.existsSync(cpackPath) && !force) {
    throw new CardPackError('cardpack already initialized. Use --force to reinitialize.', 'VALIDATION_ERROR');
  }

  fs.mkdirSync(cpackPath, { recursive: true, mode: 0o700 });

  fs.writeFileSync(
    path.join(cpackPath, CONFIG_FILE),
    JSON.stringify(defaultConfig(), null, 2),
    { mode: 0o600 }
  );

  fs.writeFileSync(path.join(cpackPath, '.gitignore'), `# cardpack local files
cards.db
cards.db-journal
cards.db-wal
cards.db-shm
`);

  return cpackPath;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Coerce a CLI string to the type of the value it replaces
 */
function coerceValue(existing: unknown, value: string, key: string): unknown {
  if (typeof existing === 'number') {
    const parsed = Number(value);
    if (Number.isNaN(parsed)) throw new ValidationError(`Config key ${key} expects a number, got '${value}'`);
    return parsed;
  }
  if (typeof existing === 'boolean') {
    if (value !== 'true' && value !== 'false') {
      throw new ValidationError(`Config key ${key} expects true or false, got '${value}'`);
    }
    return value === 'true';
  }
  if (Array.isArray(existing)) {
    return value.split(',').map((item) => item.trim()).filter(Boolean);
  }
  return value;
}

export function setConfigValue(key: string, value: string, projectRoot?: string): Config {
  // Work on a plain JSON copy so the nested objects are untyped records
  const draft: unknown = JSON.parse(JSON.stringify(loadConfig(projectRoot)));
  const keys = key.split('.');
  const lastKey = keys.pop();

  let current: unknown = draft;
  for (const k of keys) {
    current = isRecord(current) ? current[k] : undefined;
  }

  if (!lastKey || !isRecord(current) || !(lastKey in current) || isRecord(current[lastKey])) {
    throw new ValidationError(`Invalid config key: ${key}`);
  }

  current[lastKey] = coerceValue(current[lastKey], value, key);

  const validated = ConfigSchema.safeParse(draft);
  if (!validated.success) {
    throw new ValidationError(
      `Invalid value for ${key}`,
      validated.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  saveConfig(validated.data, projectRoot);
  return validated.data;
}

export function getConfigValue(key: string, projectRoot?: string): unknown {
  let current: unknown = loadConfig(projectRoot);

  for (const k of key.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[k];
  }

  return current;
}
