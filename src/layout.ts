import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

/**
 * Skill project layout — conventional paths every command agrees on.
 */
export const MANIFEST_DIR = '.claude-plugin';
export const MARKETPLACE_MANIFEST = `${MANIFEST_DIR}/marketplace.json`;
export const PLUGIN_MANIFEST = `${MANIFEST_DIR}/plugin.json`;
export const SKILLS_DIR = 'skills';
export const COMMANDS_DIR = '.claude/commands';

/** Manifests checked for JSON syntax by the validator */
export const JSON_MANIFESTS = [MARKETPLACE_MANIFEST, PLUGIN_MANIFEST];

/** Directories created by `createSkill` */
export const SKILL_DIRECTORIES = [
  MANIFEST_DIR,
  COMMANDS_DIR,
  SKILLS_DIR,
  'templates/skill',
  'templates/command',
  'config',
  'docs',
];

export const SKILL_NAME_PLACEHOLDER = '{skill_name}';

const KEBAB_CASE = /^[a-z0-9-]+$/;

export function isKebabCase(name: string): boolean {
  return KEBAB_CASE.test(name);
}

export function skillDefinitionPath(skillName: string): string {
  return `${SKILLS_DIR}/${skillName}.md`;
}

export function commandPath(commandName: string): string {
  return `${COMMANDS_DIR}/${commandName}.md`;
}

/** Replace every `{skill_name}` placeholder in a configured pattern */
export function expandPattern(pattern: string, skillName: string): string {
  return pattern.replaceAll(SKILL_NAME_PLACEHOLDER, skillName);
}

/** Root of this package (one level above src/) */
export const PACKAGE_ROOT = join(dirname(fileURLToPath(import.meta.url)), '..');

export const DEFAULT_TEMPLATE_DIR = join(PACKAGE_ROOT, 'templates');
export const DEFAULT_CONFIG_PATH = join(PACKAGE_ROOT, 'config', 'config.json');
