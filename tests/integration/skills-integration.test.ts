/**
 * Integration tests for the skill pipeline with real components.
 * Tests the full flow: settings → discovery → registry → catalog → tool.
 */

import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigManager, NodeFileSystem } from '../../src/config/manager.js';
import type { IEnvReader } from '../../src/config/env.js';
import { SkillLoader } from '../../src/skills/loader.js';
import { SkillRegistry } from '../../src/skills/registry.js';
import { createSkillTool, type SkillToolMetadata } from '../../src/skills/tool.js';
import { Tool } from '../../src/tools/tool.js';
import { writeSkillFile } from '../fixtures/factories.js';

class EmptyEnvReader implements IEnvReader {
  get(): string | undefined {
    return undefined;
  }

  getNumber(): number | undefined {
    return undefined;
  }
}

/** File system whose home directory is a test directory */
class TempHomeFileSystem extends NodeFileSystem {
  constructor(private readonly home: string) {
    super();
  }

  override getHomeDir(): string {
    return this.home;
  }
}

describe('Skills Integration', () => {
  let tempDir: string;
  let projectRoot: string;
  let homeDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'skills-integration-'));
    projectRoot = join(tempDir, 'project');
    homeDir = join(tempDir, 'home');

    await writeSkillFile(
      join(projectRoot, '.claude', 'skills', 'my-workflow'),
      { name: 'my-workflow', description: 'Project workflow' },
      '# Workflow\n\nRun the project steps.'
    );
    await writeSkillFile(
      join(homeDir, '.claude', 'skills', 'my-workflow'),
      { name: 'my-workflow', description: 'Personal workflow' },
      '# Personal'
    );
    await writeSkillFile(
      join(homeDir, '.minion', 'skills', 'team', 'review'),
      { name: 'review', description: 'Review a change' },
      '# Review'
    );
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  async function loadSettings(settings: Record<string, unknown>): Promise<SkillLoader> {
    const configDir = join(projectRoot, '.agent');
    await mkdir(configDir, { recursive: true });
    await writeFile(join(configDir, 'settings.json'), JSON.stringify(settings));

    const manager = new ConfigManager({
      fileSystem: new TempHomeFileSystem(homeDir),
      envReader: new EmptyEnvReader(),
    });
    const result = await manager.load(projectRoot);
    if (!result.success) {
      throw new Error(result.message);
    }

    const { skills } = result.result;
    return new SkillLoader({
      projectRoot: skills.projectRoot,
      homeDir: skills.homeDir,
      dirNames: skills.dirNames,
      registry: new SkillRegistry(),
    });
  }

  it('loads both tiers with project priority', async () => {
    const loader = await loadSettings({ skills: { projectRoot, homeDir: '~' } });

    const registry = loader.loadAll();

    expect(registry.listNames()).toEqual(['my-workflow', 'review']);
    expect(registry.get('my-workflow')?.description).toBe('Project workflow');
    expect(registry.get('review')?.path).toBe(join(homeDir, '.minion', 'skills', 'team', 'review'));
  });

  it('restricts discovery to configured directory names', async () => {
    const loader = await loadSettings({ skills: { projectRoot, homeDir, dirNames: ['.minion'] } });

    expect(loader.loadAll().listNames()).toEqual(['review']);
  });

  it('serves loaded skills through the skill tool', async () => {
    const loader = await loadSettings({ skills: { projectRoot, homeDir } });
    const registry = loader.loadAll();
    const tool = await createSkillTool({ registry }).init();

    expect(tool.description).toContain('<name>my-workflow</name>');
    expect(tool.description).toContain('<location>user</location>');

    const result = await tool.execute(
      { skill: '/my-workflow' },
      Tool.createNoopContext<SkillToolMetadata>()
    );
    expect(result.output).toBe(
      `Loading: my-workflow\nBase directory: ${join(projectRoot, '.claude', 'skills', 'my-workflow')}\n\n# Workflow\n\nRun the project steps.`
    );
  });
});
