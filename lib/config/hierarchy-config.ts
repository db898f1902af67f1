import fs from 'fs';
import type pino from 'pino';
import { z } from 'zod';
import { HierarchyError } from '@/lib/errors/hierarchy-error';
import { createModuleLogger } from '@/lib/observability/logger';

const log = createModuleLogger('hierarchy-config');

const extensionSchema = z
  .string()
  .transform((value) => value.trim().replace(/^\.+/, ''))
  .pipe(z.string().min(1, 'extension must not be empty'));

/** Every level the root logger accepts, since both read `LOG_LEVEL`. */
const LOG_LEVELS = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
] as const satisfies readonly pino.LevelWithSilent[];

export const HierarchyConfigSchema = z.object({
  /** Appended to every candidate, e.g. `twig` gives `page-7.twig` */
  extension: extensionSchema,
  /** Stripped from explicit template overrides before suffixing */
  templateSourceExtension: extensionSchema,
  logLevel: z.enum(LOG_LEVELS),
});

export type HierarchyConfig = z.infer<typeof HierarchyConfigSchema>;

export const DEFAULT_HIERARCHY_CONFIG: HierarchyConfig = {
  extension: 'twig',
  templateSourceExtension: 'php',
  logLevel: 'info',
};

export interface LoadHierarchyConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** JSON file with a partial config; falls back to `HIERARCHY_CONFIG_PATH` */
  configPath?: string;
}

function readConfigFile(configPath: string): Record<string, unknown> {
  if (!fs.existsSync(configPath)) return {};

  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return { ...parsed };
    }
    log.warn({ configPath }, 'Hierarchy config file is not a JSON object, using defaults');
  } catch (err) {
    log.warn({ configPath, err }, 'Hierarchy config file is not valid JSON, using defaults');
  }
  return {};
}

/**
 * Resolve the hierarchy config: defaults, then the optional JSON file, then
 * environment variables.
 */
export function loadHierarchyConfig(options: LoadHierarchyConfigOptions = {}): HierarchyConfig {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? env.HIERARCHY_CONFIG_PATH;
  const fileConfig = configPath ? readConfigFile(configPath) : {};

  const envOverrides: Record<string, string> = {};
  if (env.HIERARCHY_EXTENSION) {
    envOverrides.extension = env.HIERARCHY_EXTENSION;
  }
  if (env.HIERARCHY_SOURCE_EXTENSION) {
    envOverrides.templateSourceExtension = env.HIERARCHY_SOURCE_EXTENSION;
  }
  if (env.LOG_LEVEL) {
    envOverrides.logLevel = env.LOG_LEVEL;
  }

  const result = HierarchyConfigSchema.safeParse({
    ...DEFAULT_HIERARCHY_CONFIG,
    ...fileConfig,
    ...envOverrides,
  });

  if (!result.success) {
    throw HierarchyError.invalidConfig(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return result.data;
}
