import { chmodSync, existsSync, mkdirSync, readFileSync, statSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { z } from 'zod';
import { resolveConfig } from './config.ts';
import { ConfigError, TemplateNotFoundError, errorMessage } from './errors.ts';
import {
  COMMANDS_DIR,
  MARKETPLACE_MANIFEST,
  PLUGIN_MANIFEST,
  SKILL_DIRECTORIES,
  commandPath,
  expandPattern,
  isKebabCase,
  skillDefinitionPath,
} from './layout.ts';
import { syncSkillFiles } from './sync.ts';
import { DEFAULT_VERSION, TemplateRenderer } from './template.ts';
import type {
  HandlerOptions,
  HandlerResult,
  SyncResult,
  TemplateContext,
  ValidationResult,
} from './types.ts';
import { validateSkillStructure } from './validate.ts';
import { isDirectory } from './walk.ts';

/** Files written by `createSkill`, keyed by their path in the new skill */
const SKILL_FILES: ReadonlyArray<[file: string, template: string]> = [
  [MARKETPLACE_MANIFEST, 'skill/marketplace.json.template'],
  [PLUGIN_MANIFEST, 'skill/plugin.json.template'],
  [skillDefinitionPath('{skill_name}'), 'skill/skill.md.template'],
  ['README.md', 'skill/README.md.template'],
  ['.claude/CLAUDE.md', 'skill/CLAUDE.md.template'],
  ['install.sh', 'skill/install.sh.template'],
  ['.gitignore', 'skill/gitignore.template'],
  ['LICENSE', 'skill/LICENSE.template'],
];

const INSTALL_SCRIPT = 'install.sh';
const COMMAND_TEMPLATE = 'command/command.md.template';

// ── Parameters ────────────────────────────────────────────────────────

const required = (field: string) =>
  z
    .string({ required_error: `${field} is required`, invalid_type_error: `${field} must be a string` })
    .trim()
    .min(1, `${field} is required`);

const optional = () =>
  z
    .string()
    .trim()
    .optional()
    .transform((v) => v || undefined);

const createSkillSchema = z.object({
  skillName: required('skillName'),
  skillDescription: required('skillDescription'),
  authorName: required('authorName'),
  authorEmail: required('authorEmail'),
  githubUser: required('githubUser'),
  targetDir: optional(),
  version: optional(),
});

const addCommandSchema = z.object({
  skillDir: required('skillDir'),
  commandName: required('commandName'),
  commandDescription: required('commandDescription'),
  commandInstructions: optional(),
});

const syncSkillSchema = z.object({
  sourceDir: required('sourceDir'),
  targetDir: required('targetDir'),
  skillName: required('skillName'),
  dryRun: z.boolean().default(false),
});

const validateSkillSchema = z.object({
  skillDir: required('skillDir'),
  skillName: optional(),
});

export type CreateSkillPayload = Partial<z.input<typeof createSkillSchema>>;
export type AddCommandPayload = Partial<z.input<typeof addCommandSchema>>;
export type SyncSkillPayload = Partial<z.input<typeof syncSkillSchema>>;
export type ValidateSkillPayload = Partial<z.input<typeof validateSkillSchema>>;

export interface CreateSkillData {
  skillName: string;
  skillPath: string;
  createdFiles: string[];
}

export interface AddCommandData {
  commandName: string;
  commandFile: string;
  description?: string;
  warning?: string;
}

// ── Handlers ──────────────────────────────────────────────────────────

/**
 * Scaffold a new skill project at `<targetDir>/<skillName>`.
 *
 * Every file is rendered before anything is written, so a missing template
 * leaves no partial directory behind.
 */
export function createSkill(
  payload: CreateSkillPayload,
  options: HandlerOptions = {},
): HandlerResult<CreateSkillData> {
  return guard<CreateSkillData>(() => {
    const parsed = createSkillSchema.safeParse(payload);
    if (!parsed.success) return failure(firstIssue(parsed.error));
    const params = parsed.data;

    if (!isKebabCase(params.skillName)) {
      return failure('skillName must be in kebab-case (lowercase with hyphens)');
    }

    const skillPath = join(params.targetDir ?? process.cwd(), params.skillName);
    if (existsSync(skillPath)) {
      return failure(`Directory already exists: ${skillPath}`);
    }

    const now = options.now ?? (() => new Date());
    const renderer = new TemplateRenderer({ templateDir: options.templateDir, now });
    const context: TemplateContext = {
      skill_name: params.skillName,
      skill_description: params.skillDescription,
      author_name: params.authorName,
      author_email: params.authorEmail,
      github_user: params.githubUser,
      version: params.version ?? DEFAULT_VERSION,
      year: now().getFullYear(),
    };

    const rendered: Array<[file: string, content: string]> = [];
    for (const [pattern, template] of SKILL_FILES) {
      try {
        const fileContext = pattern.endsWith('.json') ? escapeForJson(context) : context;
        rendered.push([expandPattern(pattern, params.skillName), renderer.render(template, fileContext)]);
      } catch (e) {
        if (e instanceof TemplateNotFoundError) {
          return failure(`Template not found: ${e.templateName}`);
        }
        return failure(`Failed to render ${template}: ${errorMessage(e)}`);
      }
    }

    for (const dir of SKILL_DIRECTORIES) {
      mkdirSync(join(skillPath, dir), { recursive: true });
    }

    const createdFiles: string[] = [];
    for (const [file, content] of rendered) {
      const fullPath = join(skillPath, file);
      mkdirSync(dirname(fullPath), { recursive: true });
      writeFileSync(fullPath, content, 'utf-8');
      createdFiles.push(file);
    }

    makeExecutable(join(skillPath, INSTALL_SCRIPT));

    return {
      success: true,
      message: `Successfully created skill: ${params.skillName}`,
      data: { skillName: params.skillName, skillPath, createdFiles },
    };
  });
}

/**
 * Add a slash command under `.claude/commands/` and register it in the
 * plugin manifest. A failed manifest update still counts as success, with a
 * warning in the data.
 */
export function addCommand(
  payload: AddCommandPayload,
  options: HandlerOptions = {},
): HandlerResult<AddCommandData> {
  return guard<AddCommandData>(() => {
    const parsed = addCommandSchema.safeParse(payload);
    if (!parsed.success) return failure(firstIssue(parsed.error));
    const { skillDir, commandName, commandDescription } = parsed.data;

    if (!existsSync(skillDir)) {
      return failure(`Skill directory not found: ${skillDir}`);
    }
    if (!isKebabCase(commandName)) {
      return failure('commandName must be in kebab-case (lowercase with hyphens)');
    }

    const commandFile = commandPath(commandName);
    const fullPath = join(skillDir, commandFile);
    if (existsSync(fullPath)) {
      return failure(`Command already exists: ${commandName}`);
    }

    const renderer = new TemplateRenderer({ templateDir: options.templateDir, now: options.now });
    let content: string;
    try {
      content = renderer.render(COMMAND_TEMPLATE, {
        command_name: commandName,
        command_description: commandDescription,
        command_instructions:
          parsed.data.commandInstructions ?? `Use the skill to handle ${commandName} requests.`,
      });
    } catch (e) {
      if (e instanceof TemplateNotFoundError) {
        return failure(`Template not found: ${e.templateName}`);
      }
      throw e;
    }

    mkdirSync(join(skillDir, COMMANDS_DIR), { recursive: true });
    writeFileSync(fullPath, content, 'utf-8');

    const manifestPath = join(skillDir, PLUGIN_MANIFEST);
    if (existsSync(manifestPath)) {
      try {
        registerCommand(manifestPath, `./${commandFile}`);
      } catch (e) {
        return {
          success: true,
          message: `Command created but failed to update plugin.json: ${errorMessage(e)}`,
          data: {
            commandName,
            commandFile,
            warning: 'Manually update plugin.json to register this command',
          },
        };
      }
    }

    return {
      success: true,
      message: `Successfully added command: ${commandName}`,
      data: { commandName, commandFile, description: commandDescription },
    };
  });
}

/** Copy a standalone skill's files into a marketplace tree */
export function syncSkill(
  payload: SyncSkillPayload,
  options: HandlerOptions = {},
): HandlerResult<SyncResult> {
  return guard<SyncResult>(() => {
    const parsed = syncSkillSchema.safeParse(payload);
    if (!parsed.success) return failure(firstIssue(parsed.error));
    const { sourceDir, targetDir, skillName, dryRun } = parsed.data;

    if (!isDirectory(sourceDir)) {
      return failure(`Source directory not found: ${sourceDir}`);
    }
    if (!isDirectory(targetDir)) {
      return failure(`Target directory not found: ${targetDir}`);
    }

    const config = resolveConfig({ configPath: options.configPath });
    const result = syncSkillFiles(sourceDir, targetDir, skillName, {
      config,
      dryRun,
      now: options.now,
    });

    if (!result.success) {
      return { success: false, error: 'Sync failed', data: result };
    }

    const mode = dryRun ? 'DRY RUN' : 'Synced';
    return {
      success: true,
      message: `${mode}: ${result.copiedFiles.length} file(s) synced`,
      data: result,
    };
  });
}

/** Validate a skill project; `success` mirrors the report's `valid` */
export function validateSkill(
  payload: ValidateSkillPayload,
  options: HandlerOptions = {},
): HandlerResult<ValidationResult> {
  return guard<ValidationResult>(() => {
    const parsed = validateSkillSchema.safeParse(payload);
    if (!parsed.success) return failure(firstIssue(parsed.error));

    const config = resolveConfig({ configPath: options.configPath });
    const result = validateSkillStructure(parsed.data.skillDir, {
      config,
      skillName: parsed.data.skillName,
    });

    if (result.valid) {
      return { success: true, message: 'Skill validation passed', data: result };
    }
    return {
      success: false,
      message: `Skill validation failed with ${result.errors.length} error(s)`,
      data: result,
    };
  });
}

// ── Helpers ───────────────────────────────────────────────────────────

function failure<T>(error: string): HandlerResult<T> {
  return { success: false, error };
}

function firstIssue(error: z.ZodError): string {
  return error.issues[0]?.message ?? 'Invalid parameters';
}

/** Turn anything thrown inside a handler into a failed result */
function guard<T>(run: () => HandlerResult<T>): HandlerResult<T> {
  try {
    return run();
  } catch (e) {
    if (e instanceof ConfigError) {
      return failure(e.message);
    }
    return failure(`Unexpected error: ${errorMessage(e)}`);
  }
}

function makeExecutable(path: string): void {
  chmodSync(path, statSync(path).mode | 0o111);
}

function registerCommand(manifestPath: string, entry: string): void {
  const data: unknown = JSON.parse(readFileSync(manifestPath, 'utf-8'));
  if (!isRecord(data)) {
    throw new Error('plugin.json is not a JSON object');
  }

  const commands = data.commands ?? [];
  if (!Array.isArray(commands)) {
    throw new Error('"commands" in plugin.json is not an array');
  }

  data.commands = [...commands, entry];
  writeFileSync(manifestPath, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
}

/** Escape string values for placement inside JSON string literals */
function escapeForJson(context: TemplateContext): TemplateContext {
  const escaped: TemplateContext = {};
  for (const [key, value] of Object.entries(context)) {
    escaped[key] = typeof value === 'string' ? JSON.stringify(value).slice(1, -1) : value;
  }
  return escaped;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
