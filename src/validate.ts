import { accessSync, constants, existsSync, readFileSync, readdirSync } from 'fs';
import { basename, join, resolve } from 'path';
import { errorMessage } from './errors.ts';
import { extractFrontmatter, hasFields } from './frontmatter.ts';
import {
  COMMANDS_DIR,
  JSON_MANIFESTS,
  PLUGIN_MANIFEST,
  SKILLS_DIR,
  expandPattern,
  skillDefinitionPath,
} from './layout.ts';
import type { SkillConfig, ValidationResult } from './types.ts';
import { isDirectory, isFileEntry } from './walk.ts';

export interface ValidateOptions {
  config: SkillConfig;
  /** Detected from the skill directory when omitted */
  skillName?: string;
}

class ValidationReport {
  readonly errors: string[] = [];
  readonly warnings: string[] = [];
  readonly info: string[] = [];

  error(message: string): void {
    this.errors.push(message);
  }

  warn(message: string): void {
    this.warnings.push(message);
  }

  note(message: string): void {
    this.info.push(message);
  }

  toResult(): ValidationResult {
    return {
      valid: this.errors.length === 0,
      errors: [...this.errors],
      warnings: [...this.warnings],
      info: [...this.info],
    };
  }
}

/**
 * Check a skill project's structure.
 *
 * Every check runs and adds to the same report; only a missing or
 * non-directory root stops early.
 */
export function validateSkillStructure(skillDir: string, options: ValidateOptions): ValidationResult {
  const report = new ValidationReport();

  if (!existsSync(skillDir)) {
    report.error(`Skill directory not found: ${skillDir}`);
    return report.toResult();
  }
  if (!isDirectory(skillDir)) {
    report.error(`Path is not a directory: ${skillDir}`);
    return report.toResult();
  }

  report.note(`Validating skill at: ${skillDir}`);

  let skillName = options.skillName || undefined;
  if (!skillName) {
    skillName = detectSkillName(skillDir);
    if (skillName) {
      report.note(`Detected skill name: ${skillName}`);
    } else {
      report.warn('Could not auto-detect skill name');
    }
  }

  const { validation } = options.config;

  checkRequiredFiles(skillDir, validation.required_files, skillName, report);
  checkJsonManifests(skillDir, report);
  if (skillName) {
    checkSkillDefinition(skillDir, skillName, validation.required_frontmatter, report);
  }
  checkExecutables(skillDir, validation.executable_files, report);
  checkCommands(skillDir, report);

  return report.toResult();
}

/**
 * Skill name from, in order: the plugin manifest's `name`, the only markdown
 * file under skills/, the directory name.
 */
export function detectSkillName(skillDir: string): string | undefined {
  const manifestPath = join(skillDir, PLUGIN_MANIFEST);
  if (existsSync(manifestPath)) {
    const name = readManifestName(manifestPath);
    if (name) return name;
  }

  const skillsDir = join(skillDir, SKILLS_DIR);
  if (isDirectory(skillsDir)) {
    try {
      const definitions = markdownFiles(skillsDir);
      if (definitions.length === 1) {
        return basename(definitions[0], '.md');
      }
    } catch {
      // unreadable skills/; use the directory name
    }
  }

  return basename(resolve(skillDir)) || undefined;
}

function readManifestName(manifestPath: string): string | undefined {
  try {
    const data: unknown = JSON.parse(readFileSync(manifestPath, 'utf-8'));
    if (typeof data === 'object' && data !== null && 'name' in data && typeof data.name === 'string') {
      return data.name || undefined;
    }
  } catch {
    // malformed manifest; the JSON check reports it
  }
  return undefined;
}

function checkRequiredFiles(
  skillDir: string,
  patterns: string[],
  skillName: string | undefined,
  report: ValidationReport,
): void {
  for (const pattern of patterns) {
    const file = skillName ? expandPattern(pattern, skillName) : pattern;
    if (existsSync(join(skillDir, file))) {
      report.note(`Found: ${file}`);
    } else {
      report.error(`Required file missing: ${file}`);
    }
  }
}

function checkJsonManifests(skillDir: string, report: ValidationReport): void {
  for (const file of JSON_MANIFESTS) {
    const path = join(skillDir, file);
    if (!existsSync(path)) continue;

    try {
      JSON.parse(readFileSync(path, 'utf-8'));
      report.note(`Valid JSON: ${file}`);
    } catch (e) {
      report.error(`Invalid JSON in ${file}: ${errorMessage(e)}`);
    }
  }
}

function checkSkillDefinition(
  skillDir: string,
  skillName: string,
  requiredFields: string[],
  report: ValidationReport,
): void {
  const relPath = skillDefinitionPath(skillName);
  const path = join(skillDir, relPath);

  if (!existsSync(path)) {
    report.error(`Skill definition not found: ${relPath}`);
    return;
  }

  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (e) {
    report.error(`Error reading skill definition: ${errorMessage(e)}`);
    return;
  }

  const frontmatter = extractFrontmatter(content);
  if (!hasFields(frontmatter)) {
    report.warn(`No frontmatter found in ${relPath}`);
    return;
  }

  for (const field of requiredFields) {
    if (Object.hasOwn(frontmatter, field)) {
      report.note(`Frontmatter field '${field}': ${frontmatter[field]}`);
    } else {
      report.error(`Missing required frontmatter field: ${field}`);
    }
  }
}

function checkExecutables(skillDir: string, files: string[], report: ValidationReport): void {
  for (const file of files) {
    const path = join(skillDir, file);
    if (!existsSync(path)) continue;

    if (isExecutable(path)) {
      report.note(`Executable: ${file}`);
    } else {
      report.warn(`File not executable: ${file} (run: chmod +x ${file})`);
    }
  }
}

function checkCommands(skillDir: string, report: ValidationReport): void {
  const commandsDir = join(skillDir, COMMANDS_DIR);
  if (!isDirectory(commandsDir)) {
    report.note(`No slash commands directory (${COMMANDS_DIR}/)`);
    return;
  }

  let commands: string[];
  try {
    commands = markdownFiles(commandsDir);
  } catch (e) {
    report.warn(`Could not read ${COMMANDS_DIR}/: ${errorMessage(e)}`);
    return;
  }
  if (commands.length === 0) {
    report.note('No slash commands found');
    return;
  }

  report.note(`Found ${commands.length} slash command(s)`);

  for (const file of commands) {
    try {
      const frontmatter = extractFrontmatter(readFileSync(join(commandsDir, file), 'utf-8'));
      if (Object.hasOwn(frontmatter, 'description')) {
        report.note(`Command ${basename(file, '.md')}: ${frontmatter.description}`);
      } else {
        report.warn(`Command ${file} missing 'description' in frontmatter`);
      }
    } catch (e) {
      report.warn(`Error reading command ${file}: ${errorMessage(e)}`);
    }
  }
}

/** Names of `*.md` files directly inside `dir`, sorted */
function markdownFiles(dir: string): string[] {
  return readdirSync(dir, { withFileTypes: true })
    .filter((e) => e.name.endsWith('.md') && isFileEntry(dir, e))
    .map((e) => e.name)
    .sort();
}

function isExecutable(path: string): boolean {
  try {
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}
