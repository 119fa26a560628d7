import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { TemplateNotFoundError } from './errors.ts';
import { DEFAULT_TEMPLATE_DIR } from './layout.ts';
import type { TemplateContext, TemplateValue } from './types.ts';
import { toPosixRelative, walkFiles } from './walk.ts';

export const TEMPLATE_EXTENSION = '.template';
export const DEFAULT_VERSION = '0.1.0';

const VARIABLE = /\{\{(\w+)\}\}/g;

// The if-part of an if/else block may not run past a `{{/if}}`, so sequential
// blocks resolve on their own. Nested blocks are still unsupported.
const IF_ELSE_BLOCK =
  /\{\{#if\s+(\w+)\}\}((?:(?!\{\{\/if\}\})[\s\S])*?)\{\{else\}\}([\s\S]*?)\{\{\/if\}\}/g;
const IF_BLOCK = /\{\{#if\s+(\w+)\}\}([\s\S]*?)\{\{\/if\}\}/g;

/** Reserved conditional keyword; never treated as a variable. */
const ELSE_KEYWORD = 'else';

export interface TemplateRendererOptions {
  /** Root of the template tree (default: the package's templates/ directory) */
  templateDir?: string;
  /** Clock used for the derived `timestamp` */
  now?: () => Date;
}

/**
 * Renders `{{variable}}` substitutions and `{{#if}}` blocks.
 *
 * Substitution runs first; an unknown variable renders as `{{missing:name}}`
 * so it stays visible in the output. Conditionals run second, if/else blocks
 * before plain if blocks.
 */
export class TemplateRenderer {
  readonly templateDir: string;
  private readonly now: () => Date;

  constructor(options: TemplateRendererOptions = {}) {
    this.templateDir = options.templateDir ?? DEFAULT_TEMPLATE_DIR;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Render a template file, e.g. `skill/skill.md.template`.
   *
   * @throws TemplateNotFoundError when the file does not exist
   */
  render(templateName: string, context: TemplateContext): string {
    const templatePath = join(this.templateDir, templateName);
    if (!existsSync(templatePath)) {
      throw new TemplateNotFoundError(templateName, templatePath);
    }

    return this.renderString(readFileSync(templatePath, 'utf-8'), context);
  }

  /** Render template text that is already in memory */
  renderString(template: string, context: TemplateContext): string {
    const enriched = this.enrichContext(context);
    const substituted = substituteVariables(template, enriched);
    return processConditionals(substituted, enriched);
  }

  /** Copy of `context` with the derived keys filled in where absent */
  enrichContext(context: TemplateContext): TemplateContext {
    const enriched: TemplateContext = { ...context };

    if ('skill_name' in context && !('skill_display_name' in context)) {
      enriched.skill_display_name = toDisplayName(String(context.skill_name));
    }

    if ('command_name' in context && !('command_display_name' in context)) {
      enriched.command_display_name = toDisplayName(String(context.command_name));
    }

    if (
      'github_user' in context &&
      'skill_name' in context &&
      !('repository_url' in context)
    ) {
      enriched.repository_url = `https://github.com/${String(context.github_user)}/${String(context.skill_name)}`;
    }

    if (!('timestamp' in context)) {
      enriched.timestamp = formatUtcTimestamp(this.now());
    }

    if (!('version' in context)) {
      enriched.version = DEFAULT_VERSION;
    }

    return enriched;
  }

  /**
   * List `*.template` files, optionally within one category directory.
   * Paths are relative to the template root and `/`-separated.
   */
  listTemplates(category?: string): string[] {
    return [...this.walkTemplates(category)].sort();
  }

  /** Lazily yield template paths under the root (or a category) */
  *walkTemplates(category?: string): Generator<string> {
    const searchDir = category ? join(this.templateDir, category) : this.templateDir;
    if (!existsSync(searchDir)) {
      return;
    }

    for (const file of walkFiles(searchDir)) {
      if (file.endsWith(TEMPLATE_EXTENSION)) {
        yield toPosixRelative(this.templateDir, file);
      }
    }
  }
}

/** Render a template file in one call */
export function renderTemplate(
  templateName: string,
  context: TemplateContext,
  templateDir?: string,
): string {
  return new TemplateRenderer({ templateDir }).render(templateName, context);
}

/** `my-cool-skill` → `My Cool Skill` */
export function toDisplayName(kebabName: string): string {
  return kebabName.split('-').map(capitalize).join(' ');
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/**
 * Truthiness used by `{{#if}}`: undefined, null, false, 0, '', empty arrays
 * and empty plain objects are falsy. NaN is truthy.
 */
export function isTruthy(value: TemplateValue): boolean {
  if (typeof value === 'number') {
    return value !== 0;
  }
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  if (value !== null && typeof value === 'object') {
    return Object.keys(value).length > 0;
  }
  return Boolean(value);
}

/** String form of a context value for substitution */
export function stringify(value: TemplateValue): string {
  if (Array.isArray(value)) {
    return value.map(stringify).join(', ');
  }
  if (value !== null && typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

function lookup(context: TemplateContext, name: string): TemplateValue {
  return Object.hasOwn(context, name) ? context[name] : undefined;
}

export function substituteVariables(template: string, context: TemplateContext): string {
  return template.replace(VARIABLE, (token: string, name: string) => {
    if (name === ELSE_KEYWORD) return token;
    const value = lookup(context, name);
    return value === undefined ? `{{missing:${name}}}` : stringify(value);
  });
}

export function processConditionals(template: string, context: TemplateContext): string {
  const withElse = template.replace(
    IF_ELSE_BLOCK,
    (_match: string, name: string, ifContent: string, elseContent: string) =>
      isTruthy(lookup(context, name)) ? ifContent : elseContent,
  );

  return withElse.replace(IF_BLOCK, (_match: string, name: string, ifContent: string) =>
    isTruthy(lookup(context, name)) ? ifContent : '',
  );
}

/** `2025-01-31 09:05:00 UTC` */
export function formatUtcTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}
