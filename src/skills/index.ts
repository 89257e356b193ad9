/**
 * Skills module - discovery, registry and prompt rendering for SKILL.md bundles.
 */

// Types
export { SKILL_LOCATIONS } from './types.js';
export type {
  SkillLocation,
  SkillHeader,
  SkillDocument,
  SkillProps,
  SearchRoot,
  SkillLoaderOptions,
} from './types.js';

// Header schema and validation
export {
  SkillNameSchema,
  SkillDescriptionSchema,
  AllowedToolsSchema,
  SkillHeaderSchema,
  validateHeader,
  formatValidationErrors,
} from './manifest.js';
export type { SkillHeaderFields } from './manifest.js';

// Parser
export { parseFrontmatter, hasFrontmatter } from './parser.js';

// Entity
export { Skill, trimBlankLines } from './skill.js';

// Registry
export {
  SkillRegistry,
  LOCATION_PRIORITY,
  outranks,
  getSkillRegistry,
  resetSkillRegistry,
} from './registry.js';

// Loader
export {
  SkillLoader,
  createSkillLoader,
  loadSkills,
  getAvailableSkills,
} from './loader.js';

// Prompt generation
export {
  CATALOG_OPEN_TAG,
  CATALOG_CLOSE_TAG,
  CATALOG_WRAPPER_OVERHEAD,
  escapeXml,
  wrapCatalog,
  formatSkillsSummary,
  generateSkillCommandPrompt,
  generateSkillToolPrompt,
} from './prompt.js';

// Tool
export { createSkillTool, skillTool, validateSkillName, SkillToolParameters } from './tool.js';
export type { SkillToolMetadata, SkillToolOptions } from './tool.js';
