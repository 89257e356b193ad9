/**
 * Type definitions for the Skills system.
 */

import type { SkillRegistry } from './registry.js';

/**
 * Provenance tier of a skill. Project skills override user skills.
 */
export const SKILL_LOCATIONS = ['project', 'user'] as const;

export type SkillLocation = (typeof SKILL_LOCATIONS)[number];

/**
 * Decoded SKILL.md header block. Values are whatever YAML produced
 * (strings, lists, nested mappings) and are narrowed by the manifest schema.
 */
export type SkillHeader = Record<string, unknown>;

/**
 * A SKILL.md split into its header and body. Transient: never retained.
 */
export interface SkillDocument {
  header: SkillHeader;
  body: string;
}

/**
 * Fields of a constructed skill.
 */
export interface SkillProps {
  /** Unique identifier within a registry */
  name: string;
  /** Short description used in catalogs */
  description: string;
  /** Instruction body */
  content: string;
  /** Directory containing the SKILL.md */
  path: string;
  /** Provenance tier */
  location: SkillLocation;
  /** Tool names the skill is scoped to */
  allowedTools?: readonly string[];
  license?: string;
  metadata?: Record<string, unknown>;
}

/**
 * A directory searched for skills, tagged with the tier its skills receive.
 */
export interface SearchRoot {
  path: string;
  location: SkillLocation;
}

/**
 * Options for skill loader.
 */
export interface SkillLoaderOptions {
  /** Project root (defaults to process.cwd()) */
  projectRoot?: string;
  /** Home directory for user skills (defaults to os.homedir()) */
  homeDir?: string;
  /** Hidden directory names searched under each root (defaults to .claude, .minion) */
  dirNames?: readonly string[];
  /** Registry to populate instead of the shared default */
  registry?: SkillRegistry;
  /** Debug callback */
  onDebug?: (msg: string, data?: unknown) => void;
}
