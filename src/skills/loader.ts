/**
 * Skill discovery and loading.
 * Walks the project and user search roots for SKILL.md files and feeds the
 * resulting skills into a registry.
 */

import { readFileSync, readdirSync, realpathSync, statSync } from 'node:fs';
import type { Dirent } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';
import {
  DEFAULT_SKILL_DIR_NAMES,
  SKILL_FILE_NAME,
  SKILLS_SUBDIR_NAME,
} from '../config/constants.js';
import { parseFrontmatter } from './parser.js';
import { SkillRegistry, getSkillRegistry } from './registry.js';
import { Skill } from './skill.js';
import type { SearchRoot, SkillLoaderOptions, SkillLocation } from './types.js';

function compareNames(a: Dirent, b: Dirent): number {
  if (a.name === b.name) return 0;
  return a.name < b.name ? -1 : 1;
}

/**
 * Skill loader that discovers skills under a fixed set of search roots.
 */
export class SkillLoader {
  private readonly searchRoots: readonly SearchRoot[];
  private readonly registry?: SkillRegistry;
  private readonly onDebug?: (msg: string, data?: unknown) => void;

  constructor(options: SkillLoaderOptions = {}) {
    const projectRoot = options.projectRoot ?? process.cwd();
    const home = options.homeDir ?? homedir();
    this.registry = options.registry;
    this.onDebug = options.onDebug;

    const dirNames = options.dirNames ?? DEFAULT_SKILL_DIR_NAMES;
    this.searchRoots = Object.freeze([
      ...dirNames.map((dir) => this.root(projectRoot, dir, 'project')),
      ...dirNames.map((dir) => this.root(home, dir, 'user')),
    ]);
  }

  private root(base: string, dirName: string, location: SkillLocation): SearchRoot {
    return Object.freeze({ path: join(base, dirName, SKILLS_SUBDIR_NAME), location });
  }

  private debug(msg: string, data?: unknown): void {
    this.onDebug?.(msg, data);
  }

  /**
   * Search roots with their tier, project roots first.
   * Fixed for the lifetime of the loader.
   */
  getSearchRoots(): readonly SearchRoot[] {
    return this.searchRoots;
  }

  /**
   * Find every SKILL.md below `root`, at any depth.
   * Entries are visited in name order, so the result is stable for an
   * unchanged tree. Missing or unreadable roots yield an empty list.
   *
   * @param root - Directory to walk
   * @returns Absolute SKILL.md paths
   */
  discover(root: string): string[] {
    const found: string[] = [];
    this.walk(root, found, new Set<string>());
    return found;
  }

  private walk(dir: string, found: string[], visited: Set<string>): void {
    let entries: Dirent[];
    try {
      // Symlinked directories are followed, but each real directory only once
      const real = realpathSync(dir);
      if (visited.has(real)) return;
      visited.add(real);
      entries = readdirSync(dir, { withFileTypes: true });
    } catch (e) {
      this.debug('Cannot read directory, skipping', {
        dir,
        error: e instanceof Error ? e.message : String(e),
      });
      return;
    }

    for (const entry of entries.sort(compareNames)) {
      const entryPath = join(dir, entry.name);
      const kind = this.entryKind(entry, entryPath);

      if (kind === 'file' && entry.name === SKILL_FILE_NAME) {
        found.push(entryPath);
      } else if (kind === 'directory') {
        this.walk(entryPath, found, visited);
      }
    }
  }

  private entryKind(entry: Dirent, entryPath: string): 'file' | 'directory' | 'other' {
    if (entry.isFile()) return 'file';
    if (entry.isDirectory()) return 'directory';
    if (!entry.isSymbolicLink()) return 'other';

    try {
      const stats = statSync(entryPath);
      if (stats.isFile()) return 'file';
      if (stats.isDirectory()) return 'directory';
    } catch {
      this.debug('Dangling symlink, skipping', { path: entryPath });
    }
    return 'other';
  }

  /**
   * Load a single skill from its SKILL.md.
   *
   * @returns The skill, or undefined if unreadable or missing required fields
   */
  loadSkill(documentPath: string, location: SkillLocation): Skill | undefined {
    let raw: string;
    try {
      raw = readFileSync(documentPath, 'utf-8');
    } catch (e) {
      this.debug('Failed to read SKILL.md', {
        path: documentPath,
        error: e instanceof Error ? e.message : String(e),
      });
      return undefined;
    }

    const { header, body } = parseFrontmatter(raw);
    const skill = Skill.fromDocument(documentPath, header, body, location);
    if (skill === undefined) {
      this.debug('SKILL.md is missing name or description, skipping', { path: documentPath });
      return undefined;
    }

    this.debug('Loaded skill', { name: skill.name, location, path: documentPath });
    return skill;
  }

  /**
   * Load every discoverable skill into a registry.
   *
   * @param registry - Target registry; defaults to the loader's own, then the shared one
   * @returns The populated registry
   */
  loadAll(registry?: SkillRegistry): SkillRegistry {
    const target = registry ?? this.registry ?? getSkillRegistry();
    let discovered = 0;
    let registered = 0;

    for (const { path: root, location } of this.searchRoots) {
      this.debug(`Scanning ${location} skills directory`, { dir: root });

      for (const documentPath of this.discover(root)) {
        discovered++;
        const skill = this.loadSkill(documentPath, location);
        if (skill === undefined) continue;

        if (target.register(skill)) {
          registered++;
        } else {
          this.debug('Skipped skill, name already held by an equal or higher tier', {
            name: skill.name,
            location,
            path: documentPath,
          });
        }
      }
    }

    this.debug('Discovery complete', { discovered, registered, total: target.size });
    return target;
  }

  /**
   * Clear the registry and load again.
   */
  reload(registry?: SkillRegistry): SkillRegistry {
    const target = registry ?? this.registry ?? getSkillRegistry();
    target.clear();
    return this.loadAll(target);
  }
}

/**
 * Create a skill loader.
 */
export function createSkillLoader(options?: SkillLoaderOptions): SkillLoader {
  return new SkillLoader(options);
}

/**
 * Load all skills with the given options.
 */
export function loadSkills(options?: SkillLoaderOptions): SkillRegistry {
  return new SkillLoader(options).loadAll();
}

/**
 * Skills in the shared registry, loading it from the default roots when empty.
 */
export function getAvailableSkills(): Skill[] {
  const registry = getSkillRegistry();
  if (registry.size === 0) {
    loadSkills();
  }
  return registry.listAll();
}
