/**
 * Frontmatter extraction for skill and command markdown files.
 *
 *   ---
 *   name: my-skill
 *   description: Does things
 *   ---
 *
 * Only flat `key: value` lines are understood. The first colon splits key from
 * value, both are trimmed, values stay strings. Lines without a colon are
 * ignored. Nested maps, lists and multi-line values are not supported.
 */

const FRONTMATTER_BLOCK = /^---\s*\n([\s\S]*?)\n---\s*\n/;

export type Frontmatter = Record<string, string>;

export function extractFrontmatter(content: string): Frontmatter {
  const match = FRONTMATTER_BLOCK.exec(content);
  if (!match) {
    return {};
  }

  const fields: Frontmatter = {};
  for (const line of match[1].split('\n')) {
    const colon = line.indexOf(':');
    if (colon === -1) continue;
    fields[line.slice(0, colon).trim()] = line.slice(colon + 1).trim();
  }
  return fields;
}

export function hasFields(frontmatter: Frontmatter): boolean {
  return Object.keys(frontmatter).length > 0;
}
