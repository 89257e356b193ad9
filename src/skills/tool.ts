/**
 * Skill tool - lets an agent activate a registered skill by name.
 * The tool description carries the <available_skills> catalog; executing it
 * returns the skill's prompt block.
 */

import { z } from 'zod';
import { Tool } from '../tools/tool.js';
import {
  errorResponse,
  isSkillError,
  successResponse,
  type SkillErrorCode,
  type SkillResponse,
} from '../errors/index.js';
import { generateSkillToolPrompt } from './prompt.js';
import { getSkillRegistry, type SkillRegistry } from './registry.js';
import type { Skill } from './skill.js';
import type { SkillLocation } from './types.js';

export const SkillToolParameters = z.object({
  skill: z.string().describe('Name of the skill to load (e.g., "pdf")'),
});

/**
 * Metadata attached to skill tool results.
 */
export interface SkillToolMetadata extends Tool.Metadata {
  name: string;
  location?: SkillLocation;
  allowedTools?: string[];
  error?: SkillErrorCode;
}

export interface SkillToolOptions {
  /** Registry to serve skills from (defaults to the shared registry) */
  registry?: SkillRegistry;
  /** Character budget for the catalog in the tool description */
  charBudget?: number;
}

/**
 * Check that a requested skill exists.
 * A leading slash is accepted, so "/pdf" and "pdf" name the same skill.
 */
export function validateSkillName(registry: SkillRegistry, requested: string): SkillResponse<Skill> {
  const name = requested.trim().replace(/^\//, '');
  if (name === '') {
    return errorResponse('VALIDATION_ERROR', 'Skill name cannot be empty');
  }

  const skill = registry.get(name);
  if (skill === undefined) {
    return errorResponse('NOT_FOUND', `Unknown skill: ${name}`);
  }

  return successResponse(skill, `Skill ${name} is available`);
}

/**
 * Create a skill tool bound to a registry.
 */
export function createSkillTool(
  options: SkillToolOptions = {}
): Tool.Info<typeof SkillToolParameters, SkillToolMetadata> {
  return Tool.define<typeof SkillToolParameters, SkillToolMetadata>('skill', (initCtx) => {
    const registry = options.registry ?? getSkillRegistry();
    initCtx?.onDebug?.('Initializing skill tool', { skills: registry.size });

    return {
      description: generateSkillToolPrompt(registry, options.charBudget),
      parameters: SkillToolParameters,
      execute: (args, ctx) => {
        const validation = validateSkillName(registry, args.skill);
        if (isSkillError(validation)) {
          return {
            title: `Error: ${args.skill}`,
            metadata: { name: args.skill, error: validation.error },
            output: `Error: ${validation.message}`,
          };
        }

        const skill = validation.result;
        ctx.metadata({ title: `Loading ${skill.name}...` });

        return {
          title: `Loaded skill ${skill.name}`,
          metadata: {
            name: skill.name,
            location: skill.location,
            allowedTools: [...skill.allowedTools],
          },
          output: skill.toPromptBlock(),
        };
      },
    };
  });
}

/**
 * Skill tool serving the shared registry.
 */
export const skillTool = createSkillTool();
