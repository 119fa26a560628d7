#!/usr/bin/env -S npx tsx

import pc from 'picocolors';
import * as p from '@clack/prompts';
import { readFileSync } from 'fs';
import { join } from 'path';
import { resolveConfig } from './config.ts';
import { errorMessage } from './errors.ts';
import {
  addCommand,
  createSkill,
  syncSkill,
  validateSkill,
  type CreateSkillPayload,
} from './handlers.ts';
import { PACKAGE_ROOT } from './layout.ts';
import { listSyncFiles } from './sync.ts';
import { TemplateRenderer } from './template.ts';
import type { HandlerResult, SyncResult, ValidationResult } from './types.ts';

function getVersion(): string {
  try {
    const pkg: { version?: unknown } = JSON.parse(
      readFileSync(join(PACKAGE_ROOT, 'package.json'), 'utf-8'),
    );
    return typeof pkg.version === 'string' ? pkg.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

const VERSION = getVersion();

function showHelp(): void {
  console.log(`
${pc.bold('skillwright')} — Scaffold, extend, sync and validate skill projects

${pc.bold('Usage:')} skillwright <command> [options]

${pc.bold('Commands:')}
  create [name]             Create a new skill project
  command <name>            Add a slash command to a skill
  sync <source> <target>    Copy skill files into a marketplace
  files <source>            List the files sync would copy
  validate [dir]            Validate a skill's structure
  templates [category]      List available templates
  help                      Show this help

${pc.bold('Options:')}
  --description <text>      Skill or command description
  --author <name>           Author name (create)
  --email <address>         Author email (create)
  --github <user>           GitHub user (create)
  --dir <path>              Parent directory for the new skill (create)
  --skill-version <semver>  Initial version (create, default 0.1.0)
  --instructions <text>     Command body (command)
  --skill-dir <path>        Skill directory (command, default: cwd)
  --skill <name>            Skill name (sync, files, validate)
  --dry-run                 Preview sync without writing
  --config <path>           Use this config.json
  -y, --yes                 Never prompt
  --version, -v             Show version

${pc.bold('Examples:')}
  ${pc.dim('$')} skillwright create my-skill --description "Does things" --author "Ada" --email ada@example.com --github ada
  ${pc.dim('$')} skillwright command summarize --description "Summarize a file"
  ${pc.dim('$')} skillwright sync ./my-skill ../marketplace --skill my-skill --dry-run
  ${pc.dim('$')} skillwright validate ./my-skill
`);
}

const VALUE_FLAGS = new Set([
  'description',
  'author',
  'email',
  'github',
  'dir',
  'skill-version',
  'instructions',
  'skill-dir',
  'skill',
  'config',
]);

interface ParsedArgs {
  command: string;
  positionals: string[];
  flags: Record<string, string>;
  dryRun: boolean;
  yes: boolean;
}

function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const command = args[0] || 'help';
  const positionals: string[] = [];
  const flags: Record<string, string> = {};
  let dryRun = false;
  let yes = false;

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];
    const name = arg.startsWith('--') ? arg.slice(2) : '';

    if (VALUE_FLAGS.has(name)) {
      if (i + 1 >= args.length) {
        throw new Error(`Missing value for --${name}`);
      }
      i++;
      flags[name] = args[i];
    } else if (arg === '--dry-run') {
      dryRun = true;
    } else if (arg === '-y' || arg === '--yes') {
      yes = true;
    } else if (arg === '--version' || arg === '-v') {
      console.log(VERSION);
      process.exit(0);
    } else if (arg === '--help' || arg === '-h') {
      showHelp();
      process.exit(0);
    } else if (arg.startsWith('-')) {
      throw new Error(`Unknown option: ${arg}`);
    } else {
      positionals.push(arg);
    }
  }

  return { command, positionals, flags, dryRun, yes };
}

const CREATE_PROMPTS: Array<[keyof CreateSkillPayload, string, string]> = [
  ['skillName', 'Skill name (kebab-case)', 'my-skill'],
  ['skillDescription', 'What does the skill do?', 'Helps with ...'],
  ['authorName', 'Author name', 'Your Name'],
  ['authorEmail', 'Author email', 'you@example.com'],
  ['githubUser', 'GitHub user', 'your-handle'],
];

/** Ask for any missing create parameter; null when the user cancels */
async function promptMissing(payload: CreateSkillPayload): Promise<CreateSkillPayload | null> {
  const filled: CreateSkillPayload = { ...payload };

  for (const [key, message, placeholder] of CREATE_PROMPTS) {
    if (filled[key]) continue;

    const answer = await p.text({ message, placeholder });
    if (p.isCancel(answer)) {
      p.cancel('Cancelled.');
      return null;
    }
    filled[key] = answer;
  }

  return filled;
}

function printResult<T>(result: HandlerResult<T>): void {
  if (result.success) {
    console.log(`  ${pc.green('✓')} ${result.message ?? 'Done'}`);
  } else {
    console.log(`  ${pc.red('✗')} ${result.error ?? result.message ?? 'Failed'}`);
    process.exitCode = 1;
  }
}

function printSyncResult(result: SyncResult): void {
  for (const file of result.copiedFiles) {
    console.log(`  ${pc.green('✓')} ${file}`);
  }
  for (const backup of result.backups) {
    console.log(`  ${pc.yellow('↺')} ${backup.original} ${pc.dim('→')} ${backup.backup}`);
  }
  for (const skipped of result.skippedFiles) {
    console.log(`  ${pc.dim('○')} ${skipped.file} ${pc.dim(`(${skipped.reason})`)}`);
  }
  for (const error of result.errors) {
    console.log(`  ${pc.red('✗')} ${pc.red(error)}`);
  }

  console.log();
  const parts: string[] = [];
  if (result.copiedFiles.length > 0) parts.push(pc.green(`${result.copiedFiles.length} copied`));
  if (result.backups.length > 0) parts.push(pc.yellow(`${result.backups.length} backed up`));
  if (result.skippedFiles.length > 0) parts.push(pc.dim(`${result.skippedFiles.length} skipped`));
  if (result.errors.length > 0) parts.push(pc.red(`${result.errors.length} failed`));
  if (parts.length > 0) console.log(`  ${parts.join(', ')}`);
}

function printValidationResult(result: ValidationResult): void {
  for (const line of result.info) {
    console.log(`  ${pc.dim('·')} ${line}`);
  }
  for (const line of result.warnings) {
    console.log(`  ${pc.yellow('!')} ${line}`);
  }
  for (const line of result.errors) {
    console.log(`  ${pc.red('✗')} ${line}`);
  }
  console.log();
}

async function cmdCreate(args: ParsedArgs): Promise<void> {
  let payload: CreateSkillPayload | null = {
    skillName: args.positionals[0],
    skillDescription: args.flags.description,
    authorName: args.flags.author,
    authorEmail: args.flags.email,
    githubUser: args.flags.github,
    targetDir: args.flags.dir,
    version: args.flags['skill-version'],
  };

  if (!args.yes && process.stdin.isTTY) {
    payload = await promptMissing(payload);
    if (!payload) return;
  }

  const result = createSkill(payload);
  printResult(result);
  if (result.success && result.data) {
    for (const file of result.data.createdFiles) {
      console.log(`    ${pc.dim('+')} ${file}`);
    }
  }
}

function cmdCommand(args: ParsedArgs): void {
  const result = addCommand({
    skillDir: args.flags['skill-dir'] ?? process.cwd(),
    commandName: args.positionals[0],
    commandDescription: args.flags.description,
    commandInstructions: args.flags.instructions,
  });
  printResult(result);
  if (result.data?.warning) {
    p.log.warn(result.data.warning);
  }
}

function cmdSync(args: ParsedArgs): void {
  const [sourceDir, targetDir] = args.positionals;

  if (args.dryRun) {
    console.log(pc.yellow('  Dry run — no changes will be made\n'));
  }

  const result = syncSkill(
    { sourceDir, targetDir, skillName: args.flags.skill, dryRun: args.dryRun },
    { configPath: args.flags.config },
  );
  if (result.data) {
    printSyncResult(result.data);
  }
  printResult(result);
}

function cmdFiles(args: ParsedArgs): void {
  const sourceDir = args.positionals[0] ?? process.cwd();
  const skillName = args.flags.skill;
  if (!skillName) {
    p.log.error(`${pc.bold('--skill')} is required.`);
    process.exitCode = 1;
    return;
  }

  const config = resolveConfig({ configPath: args.flags.config });
  const files = listSyncFiles(sourceDir, skillName, config);
  if (files.length === 0) {
    p.log.warn('Nothing to sync.');
    return;
  }
  for (const file of files) {
    console.log(`  ${pc.dim('·')} ${file}`);
  }
}

function cmdValidate(args: ParsedArgs): void {
  const result = validateSkill(
    { skillDir: args.positionals[0] ?? process.cwd(), skillName: args.flags.skill },
    { configPath: args.flags.config },
  );
  if (result.data) {
    printValidationResult(result.data);
  }
  printResult(result);
}

function cmdTemplates(args: ParsedArgs): void {
  const renderer = new TemplateRenderer();
  const templates = renderer.listTemplates(args.positionals[0]);

  console.log(`  ${pc.bold('Templates')} ${pc.dim(renderer.templateDir)}`);
  console.log();
  for (const name of templates) {
    console.log(`    ${pc.dim('·')} ${name}`);
  }
}

// ── Main ──────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const args = parseArgs(process.argv);

  if (args.command === '--version' || args.command === '-v') {
    console.log(VERSION);
    return;
  }

  if (
    args.command === '--help' ||
    args.command === '-h' ||
    args.command === 'help'
  ) {
    showHelp();
    return;
  }

  console.log();

  switch (args.command) {
    case 'create':
    case 'new':
      await cmdCreate(args);
      break;
    case 'command':
    case 'cmd':
      cmdCommand(args);
      break;
    case 'sync':
      cmdSync(args);
      break;
    case 'files':
      cmdFiles(args);
      break;
    case 'validate':
    case 'check':
      cmdValidate(args);
      break;
    case 'templates':
      cmdTemplates(args);
      break;
    default:
      console.log(pc.red(`  Unknown command: ${args.command}`));
      console.log(pc.dim('  Run "skillwright help" for usage.'));
      process.exit(1);
  }

  console.log();
}

main().catch((e) => {
  console.error(pc.red(`Error: ${errorMessage(e)}`));
  process.exit(1);
});
