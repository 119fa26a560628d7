import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, writeFileSync, chmodSync, rmSync, symlinkSync } from 'fs';
import { basename, dirname, join } from 'path';
import { tmpdir } from 'os';
import { defaultConfig } from '../src/config.ts';
import { validateSkillStructure, detectSkillName } from '../src/validate.ts';

function writeFile(root: string, rel: string, content: string) {
  const path = join(root, rel);
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content);
  return path;
}

/** A skill that passes every check */
function setupSkill(root: string, name = 'my-skill') {
  writeFile(root, '.claude-plugin/marketplace.json', JSON.stringify({ name: `${name}-marketplace` }));
  writeFile(root, '.claude-plugin/plugin.json', JSON.stringify({ name }));
  writeFile(root, `skills/${name}.md`, `---\nname: ${name}\ndescription: Does things\n---\n# Body\n`);
  writeFile(root, 'README.md', '# Readme\n');
  const install = writeFile(root, 'install.sh', '#!/bin/bash\n');
  chmodSync(install, 0o755);
}

describe('validateSkillStructure', () => {
  let root: string;
  const config = defaultConfig();

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'skillwright-validate-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('should pass a complete skill', () => {
    setupSkill(root);
    writeFile(root, '.claude/commands/run.md', '---\ndescription: Run it\n---\n# Run\n');

    const result = validateSkillStructure(root, { config });

    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([]);
    expect(result.info).toEqual([
      `Validating skill at: ${root}`,
      'Detected skill name: my-skill',
      'Found: .claude-plugin/marketplace.json',
      'Found: .claude-plugin/plugin.json',
      'Found: skills/my-skill.md',
      'Found: install.sh',
      'Found: README.md',
      'Valid JSON: .claude-plugin/marketplace.json',
      'Valid JSON: .claude-plugin/plugin.json',
      "Frontmatter field 'name': my-skill",
      "Frontmatter field 'description': Does things",
      'Executable: install.sh',
      'Found 1 slash command(s)',
      'Command run: Run it',
    ]);
  });

  it('should report a missing manifest and still run the other checks', () => {
    setupSkill(root);
    rmSync(join(root, '.claude-plugin', 'marketplace.json'));

    const result = validateSkillStructure(root, { config });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['Required file missing: .claude-plugin/marketplace.json']);
    expect(result.info).toContain('No slash commands directory (.claude/commands/)');
    expect(result.info).toContain('Valid JSON: .claude-plugin/plugin.json');
  });

  it('should report malformed JSON without hiding the other manifest', () => {
    setupSkill(root);
    writeFile(root, '.claude-plugin/marketplace.json', '{"name": "x",}');

    const result = validateSkillStructure(root, { config });

    expect(result.valid).toBe(false);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatch(/^Invalid JSON in \.claude-plugin\/marketplace\.json: /);
    expect(result.info).toContain('Valid JSON: .claude-plugin/plugin.json');
  });

  it('should stop with one error for a missing directory', () => {
    const missing = join(root, 'nope');

    const result = validateSkillStructure(missing, { config });

    expect(result).toEqual({
      valid: false,
      errors: [`Skill directory not found: ${missing}`],
      warnings: [],
      info: [],
    });
  });

  it('should stop with one error when the path is a file', () => {
    const file = writeFile(root, 'file.txt', 'x');

    const result = validateSkillStructure(file, { config });

    expect(result.errors).toEqual([`Path is not a directory: ${file}`]);
    expect(result.info).toEqual([]);
  });

  it('should use an explicit skill name without detection', () => {
    setupSkill(root, 'other');

    const result = validateSkillStructure(root, { config, skillName: 'other' });

    expect(result.valid).toBe(true);
    expect(result.info.some((line) => line.startsWith('Detected skill name'))).toBe(false);
  });

  it('should error when the skill definition is missing', () => {
    setupSkill(root);
    rmSync(join(root, 'skills', 'my-skill.md'));

    const result = validateSkillStructure(root, { config });

    expect(result.errors).toEqual([
      'Required file missing: skills/my-skill.md',
      'Skill definition not found: skills/my-skill.md',
    ]);
  });

  it('should error on a missing required frontmatter field', () => {
    setupSkill(root);
    writeFile(root, 'skills/my-skill.md', '---\nname: my-skill\n---\n# Body\n');

    const result = validateSkillStructure(root, { config });

    expect(result.errors).toEqual(['Missing required frontmatter field: description']);
    expect(result.info).toContain("Frontmatter field 'name': my-skill");
  });

  it('should warn when the definition has no frontmatter', () => {
    setupSkill(root);
    writeFile(root, 'skills/my-skill.md', '# Just a body\n');

    const result = validateSkillStructure(root, { config });

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(['No frontmatter found in skills/my-skill.md']);
  });

  it('should warn when a configured file is not executable', () => {
    setupSkill(root);
    chmodSync(join(root, 'install.sh'), 0o644);

    const result = validateSkillStructure(root, { config });

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(['File not executable: install.sh (run: chmod +x install.sh)']);
  });

  it('should skip the executable check for absent files', () => {
    setupSkill(root);
    rmSync(join(root, 'install.sh'));

    const result = validateSkillStructure(root, { config });

    expect(result.errors).toEqual(['Required file missing: install.sh']);
    expect(result.warnings).toEqual([]);
  });

  it('should note an empty commands directory', () => {
    setupSkill(root);
    mkdirSync(join(root, '.claude', 'commands'), { recursive: true });

    const result = validateSkillStructure(root, { config });

    expect(result.info).toContain('No slash commands found');
  });

  it('should warn about commands without a description', () => {
    setupSkill(root);
    writeFile(root, '.claude/commands/bad.md', '# No frontmatter\n');
    writeFile(root, '.claude/commands/good.md', '---\ndescription: Works\n---\n');

    const result = validateSkillStructure(root, { config });

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(["Command bad.md missing 'description' in frontmatter"]);
    expect(result.info).toContain('Found 2 slash command(s)');
    expect(result.info).toContain('Command good: Works');
  });

  it('should count symlinked command files', () => {
    setupSkill(root);
    writeFile(root, '.claude/commands/plain.md', '---\ndescription: Plain\n---\n');
    const shared = writeFile(root, 'shared/linked.md', '---\ndescription: Linked\n---\n');
    symlinkSync(shared, join(root, '.claude/commands/linked.md'));

    const result = validateSkillStructure(root, { config });

    expect(result.info).toContain('Found 2 slash command(s)');
    expect(result.info).toContain('Command linked: Linked');
    expect(result.info).toContain('Command plain: Plain');
  });

  it('should ignore a dangling command symlink', () => {
    setupSkill(root);
    mkdirSync(join(root, '.claude', 'commands'), { recursive: true });
    symlinkSync(join(root, 'gone.md'), join(root, '.claude/commands/broken.md'));

    const result = validateSkillStructure(root, { config });

    expect(result.info).toContain('No slash commands found');
    expect(result.warnings).toEqual([]);
  });

  it('should apply configured required files and frontmatter fields', () => {
    setupSkill(root);
    const custom = defaultConfig();
    custom.validation.required_files = ['CHANGELOG.md'];
    custom.validation.required_frontmatter = ['license'];
    custom.validation.executable_files = [];

    const result = validateSkillStructure(root, { config: custom });

    expect(result.errors).toEqual([
      'Required file missing: CHANGELOG.md',
      'Missing required frontmatter field: license',
    ]);
  });
});

describe('detectSkillName', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'skillwright-detect-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('should prefer the plugin manifest name', () => {
    writeFile(root, '.claude-plugin/plugin.json', '{"name": "from-manifest"}');
    writeFile(root, 'skills/from-file.md', '');

    expect(detectSkillName(root)).toBe('from-manifest');
  });

  it('should fall back to the only skill definition', () => {
    writeFile(root, '.claude-plugin/plugin.json', '{"name": 42}');
    writeFile(root, 'skills/from-file.md', '');

    expect(detectSkillName(root)).toBe('from-file');
  });

  it('should use a symlinked skill definition', () => {
    const shared = writeFile(root, 'shared/linked-skill.md', '');
    mkdirSync(join(root, 'skills'));
    symlinkSync(shared, join(root, 'skills/linked-skill.md'));

    expect(detectSkillName(root)).toBe('linked-skill');
  });

  it('should fall back to the directory name', () => {
    writeFile(root, 'skills/one.md', '');
    writeFile(root, 'skills/two.md', '');

    expect(detectSkillName(root)).toBe(basename(root));
  });

  it('should ignore a malformed manifest', () => {
    writeFile(root, '.claude-plugin/plugin.json', '{oops');

    expect(detectSkillName(root)).toBe(basename(root));
  });
});
