/**
 * Tests for skill command handlers.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { CommandContext, OutputType } from '../types.js';
import { checkSkillDocument, skillHandler, splitSubcommand } from '../skills.js';
import { createTestConfig, writeSkillFile } from '../../../../tests/fixtures/factories.js';

interface OutputEntry {
  content: string;
  type?: OutputType;
}

describe('skill command handlers', () => {
  let tempDir: string;
  let projectRoot: string;
  let homeDir: string;
  let outputs: OutputEntry[];
  let context: CommandContext;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'skills-cli-'));
    projectRoot = join(tempDir, 'project');
    homeDir = join(tempDir, 'home');
    outputs = [];
    context = {
      config: createTestConfig(projectRoot, homeDir),
      onOutput: (content, type) => {
        outputs.push({ content, type });
      },
    };
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  function lines(): string[] {
    return outputs.map((entry) => entry.content);
  }

  async function addSkill(
    base: string,
    name: string,
    description: string,
    body?: string
  ): Promise<string> {
    const dir = join(base, '.claude', 'skills', name);
    await writeSkillFile(dir, { name, description }, body);
    return dir;
  }

  describe('routing', () => {
    it('defaults to list', async () => {
      const result = await skillHandler('', context);
      expect(result.success).toBe(true);
      expect(lines()[0]).toBe('No skills found.');
    });

    it('rejects unknown subcommands', async () => {
      const result = await skillHandler('explode', context);

      expect(result).toEqual({ success: false, message: 'Unknown subcommand' });
      expect(outputs[0]).toEqual({ content: 'Unknown subcommand: explode', type: 'warning' });
    });
  });

  describe('list', () => {
    it('shows the search roots when nothing is installed', async () => {
      await skillHandler('list', context);

      expect(lines()).toEqual([
        'No skills found.',
        '\nSkills are loaded from:',
        `  - ${join(projectRoot, '.claude', 'skills')} (project)`,
        `  - ${join(projectRoot, '.minion', 'skills')} (project)`,
        `  - ${join(homeDir, '.claude', 'skills')} (user)`,
        `  - ${join(homeDir, '.minion', 'skills')} (user)`,
      ]);
    });

    it('groups skills by tier', async () => {
      await addSkill(homeDir, 'notes', 'Note taking');
      await addSkill(projectRoot, 'pdf', 'PDF tools');

      const result = await skillHandler('list', context);

      expect(result.success).toBe(true);
      expect(lines()).toEqual([
        '\nRegistered Skills (2)',
        '══════════════════════════════',
        '\n[Project Skills]',
        '  pdf',
        '    PDF tools',
        '\n[User Skills]',
        '  notes',
        '    Note taking',
        '\nUse skill info <name> for details',
      ]);
    });
  });

  describe('info', () => {
    it('requires a name', async () => {
      const result = await skillHandler('info', context);
      expect(result).toEqual({ success: false, message: 'Skill name required' });
      expect(lines()).toEqual(['Usage: skill info <name>']);
    });

    it('reports unknown skills', async () => {
      const result = await skillHandler('info missing', context);

      expect(result).toEqual({ success: false, message: 'Skill not found' });
      expect(outputs).toEqual([
        { content: 'Skill not found: missing', type: 'error' },
        {
          content: `Skill 'missing' was not found. Run "skills list" to see available skills.`,
          type: 'info',
        },
      ]);
    });

    it('shows details and a preview', async () => {
      const dir = await addSkill(projectRoot, 'pdf', 'PDF tools', '# PDF\n\nStep one.');

      const result = await skillHandler('info pdf', context);

      expect(result.success).toBe(true);
      expect(lines()).toEqual([
        '\nSkill: pdf',
        '══════════════════════════════',
        '\nDescription:\n  PDF tools',
        '\nLocation: project',
        `Path: ${dir}`,
        '\n─── Instructions Preview ───',
        '# PDF',
        '',
        'Step one.',
      ]);
    });
  });

  describe('show', () => {
    it('prints the command prompt', async () => {
      const dir = await addSkill(projectRoot, 'pdf', 'PDF tools', '# PDF');

      const result = await skillHandler('show pdf', context);

      const expected = `<command-message>The "pdf" skill is loading</command-message>\n\nLoading: pdf\nBase directory: ${dir}\n\n# PDF`;
      expect(result).toEqual({ success: true, data: expected });
      expect(outputs).toEqual([{ content: expected, type: undefined }]);
    });
  });

  describe('catalog', () => {
    it('prints the catalog', async () => {
      await addSkill(projectRoot, 'pdf', 'PDF tools');

      const result = await skillHandler('catalog', context);

      expect(result.data).toBe(
        '<available_skills>\n<skill>\n<name>pdf</name>\n<description>PDF tools</description>\n<location>project</location>\n</skill>\n</available_skills>'
      );
    });

    it('applies an explicit budget', async () => {
      await addSkill(projectRoot, 'pdf', 'PDF tools');

      const result = await skillHandler('catalog 0', context);

      expect(result.data).toBe('<available_skills>\n</available_skills>');
    });

    it('uses the configured budget', async () => {
      await addSkill(projectRoot, 'pdf', 'PDF tools');
      const config = createTestConfig(projectRoot, homeDir);
      config.skills.catalogCharBudget = 10;

      const result = await skillHandler('catalog', { ...context, config });

      expect(result.data).toBe('<available_skills>\n</available_skills>');
    });

    it('rejects invalid budgets', async () => {
      for (const budget of ['-1', 'lots', '2.5']) {
        outputs = [];
        const result = await skillHandler(`catalog ${budget}`, context);
        expect(result).toEqual({ success: false, message: 'Invalid budget' });
        expect(outputs[0]).toEqual({ content: `Invalid budget: ${budget}`, type: 'error' });
      }
    });
  });

  describe('validate', () => {
    it('requires a path', async () => {
      const result = await skillHandler('validate', context);
      expect(result).toEqual({ success: false, message: 'Path required' });
    });

    it('accepts a skill directory', async () => {
      const dir = join(tempDir, 'pdf');
      await writeSkillFile(dir, { name: 'pdf', description: 'PDF tools', license: 'MIT' });

      const result = await skillHandler(`validate ${dir}`, context);

      expect(result.success).toBe(true);
      expect(lines()).toEqual([
        `\nValidating: ${dir}`,
        '─────────────────────────',
        '\nValidation PASSED',
        '\nHeader:',
        '  Name: pdf',
        '  Description: PDF tools',
        '  License: MIT',
      ]);
    });

    it('accepts a SKILL.md path', async () => {
      const file = await writeSkillFile(join(tempDir, 'pdf'), {
        name: 'pdf',
        description: 'PDF tools',
        'allowed-tools': '[Read, Bash]',
      });

      const result = await skillHandler(`validate ${file}`, context);

      expect(result.success).toBe(true);
      expect(lines()).toContain('  Allowed Tools: Read, Bash');
    });

    it('fails without frontmatter', async () => {
      const dir = join(tempDir, 'plain');
      await mkdir(dir, { recursive: true });
      await writeFile(join(dir, 'SKILL.md'), '# No header');

      const result = await skillHandler(`validate ${dir}`, context);

      const message = 'SKILL.md must start with a --- delimited header';
      expect(result).toEqual({
        success: false,
        message,
        data: { success: false, error: 'PARSE_ERROR', message },
      });
      expect(outputs.slice(2)).toEqual([
        { content: '\nValidation FAILED', type: 'error' },
        { content: `  Error: ${message}`, type: 'error' },
        { content: `Skill '${dir}' has a malformed SKILL.md header.`, type: 'info' },
      ]);
    });

    it('fails when a required field is blank', async () => {
      const dir = join(tempDir, 'nameless');
      await writeSkillFile(dir, { name: 'nameless', description: '""' });

      const result = await skillHandler(`validate ${dir}`, context);

      const message = 'description: Skill description cannot be empty';
      expect(result).toEqual({
        success: false,
        message,
        data: { success: false, error: 'VALIDATION_ERROR', message },
      });
      expect(outputs).toContainEqual({
        content: '  Error: description: Skill description cannot be empty',
        type: 'error',
      });
    });

    it('fails for a missing path', async () => {
      const result = await skillHandler(`validate ${join(tempDir, 'nowhere')}`, context);

      expect(result.success).toBe(false);
      expect(result.data).toMatchObject({ success: false, error: 'IO_ERROR' });
      expect(outputs[2]?.type).toBe('error');
      expect(outputs[2]?.content.startsWith('\nFailed to read file: ENOENT')).toBe(true);
      expect(outputs[3]).toEqual({
        content: `Could not read skill '${join(tempDir, 'nowhere')}' from disk.`,
        type: 'info',
      });
    });

    it('keeps repeated spaces inside the path', async () => {
      const dir = join(tempDir, 'my  skills', 'pdf');
      await writeSkillFile(dir, { name: 'pdf', description: 'PDF tools' });

      const result = await skillHandler(`validate ${dir}`, context);

      expect(result.success).toBe(true);
      expect(lines()[0]).toBe(`\nValidating: ${dir}`);
    });
  });
});

describe('splitSubcommand', () => {
  it('separates the first word from the rest', () => {
    expect(splitSubcommand('  validate  /tmp/a  b/SKILL.md ')).toEqual([
      'validate',
      '/tmp/a  b/SKILL.md ',
    ]);
  });

  it('returns empty parts for blank input', () => {
    expect(splitSubcommand('   ')).toEqual(['', '']);
  });
});

describe('checkSkillDocument', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'skills-check-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('returns the validated header', async () => {
    const dir = join(tempDir, 'pdf');
    await writeSkillFile(dir, { name: 'pdf', description: 'PDF tools' });

    const response = await checkSkillDocument(dir);

    expect(response.success).toBe(true);
    if (response.success) {
      expect(response.result.name).toBe('pdf');
      expect(response.message).toBe('Validation passed');
    }
  });

  it('reports a missing header as a parse error', async () => {
    const file = join(tempDir, 'SKILL.md');
    await writeFile(file, '# No header');

    expect(await checkSkillDocument(file)).toEqual({
      success: false,
      error: 'PARSE_ERROR',
      message: 'SKILL.md must start with a --- delimited header',
    });
  });
});
