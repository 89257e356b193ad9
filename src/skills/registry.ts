/**
 * Skill registry - priority-aware store of loaded skills.
 */

import { DEFAULT_CATALOG_CHAR_BUDGET } from '../config/constants.js';
import { CATALOG_SEPARATOR, wrapCatalog } from './prompt.js';
import type { Skill } from './skill.js';
import type { SkillLocation } from './types.js';

/**
 * Override rank per tier. A skill replaces a stored one only when its rank is
 * strictly higher, which makes the final state independent of register order.
 */
export const LOCATION_PRIORITY: Readonly<Record<SkillLocation, number>> = {
  user: 1,
  project: 2,
};

/**
 * Whether a skill from `incoming` may replace one from `existing`.
 */
export function outranks(incoming: SkillLocation, existing: SkillLocation): boolean {
  return LOCATION_PRIORITY[incoming] > LOCATION_PRIORITY[existing];
}

/**
 * Registry of skills keyed by name.
 *
 * Enumeration follows first-registration order; an override replaces the
 * stored skill in place.
 */
export class SkillRegistry implements Iterable<Skill> {
  private readonly skills = new Map<string, Skill>();

  /**
   * Register a skill.
   *
   * @returns True if stored, false if an equal or higher tier skill already holds the name
   */
  register(skill: Skill): boolean {
    const existing = this.skills.get(skill.name);

    if (existing !== undefined && !outranks(skill.location, existing.location)) {
      return false;
    }

    this.skills.set(skill.name, skill);
    return true;
  }

  get(name: string): Skill | undefined {
    return this.skills.get(name);
  }

  exists(name: string): boolean {
    return this.skills.has(name);
  }

  listAll(): Skill[] {
    return Array.from(this.skills.values());
  }

  listNames(): string[] {
    return Array.from(this.skills.keys());
  }

  listByLocation(location: SkillLocation): Skill[] {
    return this.listAll().filter((skill) => skill.location === location);
  }

  get size(): number {
    return this.skills.size;
  }

  clear(): void {
    this.skills.clear();
  }

  [Symbol.iterator](): Iterator<Skill> {
    return this.skills.values();
  }

  /**
   * Build the <available_skills> catalog within a character budget.
   *
   * Whole fragments are added in listing order while the joined fragment
   * text stays within `charBudget`; the first one that doesn't fit ends the
   * catalog. The wrapper tags are outside the budget, so the result is at
   * most `charBudget + CATALOG_WRAPPER_OVERHEAD` characters.
   *
   * @param charBudget - Maximum characters of fragment text
   */
  generateCatalog(charBudget: number = DEFAULT_CATALOG_CHAR_BUDGET): string {
    const budget = Number.isNaN(charBudget) ? 0 : Math.max(0, charBudget);
    const fragments: string[] = [];
    let used = 0;

    for (const skill of this.skills.values()) {
      const fragment = skill.toSummaryFragment();
      const cost = fragments.length === 0 ? fragment.length : fragment.length + CATALOG_SEPARATOR.length;
      if (used + cost > budget) {
        break;
      }
      fragments.push(fragment);
      used += cost;
    }

    return wrapCatalog(fragments);
  }
}

// Shared registry instance
let defaultRegistry: SkillRegistry | undefined;

/**
 * Get the process-wide registry, creating it on first use.
 */
export function getSkillRegistry(): SkillRegistry {
  defaultRegistry ??= new SkillRegistry();
  return defaultRegistry;
}

/**
 * Drop the shared registry so the next getSkillRegistry() starts empty.
 * Intended for test isolation and explicit reloads.
 */
export function resetSkillRegistry(): void {
  defaultRegistry = undefined;
}
