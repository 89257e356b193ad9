/**
 * Skill prompt generation for system prompt injection.
 * Builds the <available_skills> catalog wrapper and the texts handed to a
 * model when a skill is listed or activated.
 */

import type { Skill } from './skill.js';
import type { SkillRegistry } from './registry.js';

export const CATALOG_OPEN_TAG = '<available_skills>';
export const CATALOG_CLOSE_TAG = '</available_skills>';

/** Separator between fragments inside the catalog */
export const CATALOG_SEPARATOR = '\n';

/**
 * Characters the wrapper adds around the fragment text: both tags plus the
 * newline after the opening tag and before the closing tag.
 */
export const CATALOG_WRAPPER_OVERHEAD = CATALOG_OPEN_TAG.length + CATALOG_CLOSE_TAG.length + 2;

/**
 * Escape HTML/XML special characters in content.
 *
 * @param text - Text to escape
 * @returns Escaped text safe for XML
 */
export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/**
 * Wrap already-rendered fragments in the catalog container.
 * Always well-formed, even with no fragments.
 *
 * @example Output:
 * ```xml
 * <available_skills>
 * <skill>
 * <name>hello-world</name>
 * <description>A simple greeting skill for testing</description>
 * <location>project</location>
 * </skill>
 * </available_skills>
 * ```
 */
export function wrapCatalog(fragments: readonly string[]): string {
  if (fragments.length === 0) {
    return `${CATALOG_OPEN_TAG}\n${CATALOG_CLOSE_TAG}`;
  }
  return `${CATALOG_OPEN_TAG}\n${fragments.join(CATALOG_SEPARATOR)}\n${CATALOG_CLOSE_TAG}`;
}

/**
 * Format skills for display output.
 *
 * @returns Human-readable skill summary
 */
export function formatSkillsSummary(skills: readonly Skill[]): string {
  if (skills.length === 0) {
    return 'No skills available';
  }

  const lines = skills.map((s) => {
    // Truncate to 60 total chars: 57 chars + "..." (3 chars)
    const desc = s.description.length > 60 ? `${s.description.substring(0, 57)}...` : s.description;
    return `  - ${s.name} (${s.location}): ${desc}`;
  });

  return `Available skills (${String(skills.length)}):\n${lines.join('\n')}`;
}

/**
 * Expanded prompt for invoking a skill as a slash command.
 */
export function generateSkillCommandPrompt(skill: Skill): string {
  const header = `<command-message>The "${skill.name}" skill is loading</command-message>`;
  return `${header}\n\n${skill.toPromptBlock()}`;
}

/**
 * Description text for the skill tool: usage guidance followed by the
 * catalog of registered skills.
 */
export function generateSkillToolPrompt(registry: SkillRegistry, charBudget?: number): string {
  return `Execute a skill within the main conversation.

When a task matches one of the skills below, invoke this tool with the skill's
name. The skill's instructions are returned and should be followed; paths they
mention are relative to the skill's base directory.

Only invoke skills listed here. Do not invoke a skill that is already loaded.

${registry.generateCatalog(charBudget)}`;
}
