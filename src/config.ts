import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.ts';
import {
  COMMANDS_DIR,
  DEFAULT_CONFIG_PATH,
  MARKETPLACE_MANIFEST,
  PLUGIN_MANIFEST,
} from './layout.ts';
import type { SkillConfig } from './types.ts';

const syncSchema = z.object({
  backup_enabled: z.boolean().default(true),
  backup_suffix: z.string().default('.backup'),
  confirm_overwrite: z.boolean().default(true),
  files_to_sync: z
    .array(z.string().min(1))
    .default(() => ['skills/{skill_name}.md', `${COMMANDS_DIR}/`]),
});

const validationSchema = z.object({
  required_files: z
    .array(z.string().min(1))
    .default(() => [
      MARKETPLACE_MANIFEST,
      PLUGIN_MANIFEST,
      'skills/{skill_name}.md',
      'install.sh',
      'README.md',
    ]),
  required_frontmatter: z.array(z.string().min(1)).default(() => ['name', 'description']),
  executable_files: z.array(z.string().min(1)).default(() => ['install.sh']),
});

/** Every key is optional; missing sections and fields fall back to the built-in defaults. */
export const configSchema = z.object({
  sync: syncSchema.default({}),
  validation: validationSchema.default({}),
});

/** Built-in configuration, a fresh copy on every call */
export function defaultConfig(): SkillConfig {
  return configSchema.parse({});
}

/** Validate a raw (already JSON-parsed) config object and fill in defaults */
export function parseConfig(raw: unknown, source = '<inline>'): SkillConfig {
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config ${source}: ${issues}`, source);
  }
  return parsed.data;
}

/**
 * Load the configuration file.
 *
 * With no path, `config/config.json` in the package root is used when present,
 * otherwise the built-in defaults. An explicit path must exist.
 */
export function loadConfig(configPath?: string): SkillConfig {
  const path = configPath ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(path)) {
    if (configPath) {
      throw new ConfigError(`Config file not found: ${configPath}`, configPath);
    }
    return defaultConfig();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (e) {
    throw new ConfigError(`Invalid JSON in config ${path}: ${errorMessage(e)}`, path);
  }

  return parseConfig(raw, path);
}

/** Resolve the config a component should use: explicit object > file > defaults */
export function resolveConfig(options: { config?: SkillConfig; configPath?: string }): SkillConfig {
  return options.config ?? loadConfig(options.configPath);
}
