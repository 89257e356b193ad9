/**
 * Skill management command handlers.
 * Provides skill list, info, show, catalog and validate subcommands.
 */

import { readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import type { CommandContext, CommandHandler, CommandResult } from './types.js';
import { DEFAULT_CATALOG_CHAR_BUDGET, SKILL_FILE_NAME } from '../../config/constants.js';
import {
  errorResponse,
  getUserFriendlyMessage,
  isSkillError,
  successResponse,
  type SkillResponse,
} from '../../errors/index.js';
import { SkillLoader } from '../../skills/loader.js';
import {
  formatValidationErrors,
  validateHeader,
  type SkillHeaderFields,
} from '../../skills/manifest.js';
import { hasFrontmatter, parseFrontmatter } from '../../skills/parser.js';
import { generateSkillCommandPrompt } from '../../skills/prompt.js';
import { SkillRegistry } from '../../skills/registry.js';
import type { Skill } from '../../skills/skill.js';

export const SKILL_USAGE = 'Usage: skill [list|info <name>|show <name>|catalog [budget]|validate <path>]';

/**
 * Build a loader from the context's config.
 */
function createLoader(context: CommandContext): SkillLoader {
  const skills = context.config?.skills;
  return new SkillLoader({
    projectRoot: skills?.projectRoot,
    homeDir: skills?.homeDir,
    dirNames: skills?.dirNames,
    registry: new SkillRegistry(),
    onDebug: context.onDebug,
  });
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

/**
 * Look up a named skill, reporting usage or not-found errors.
 */
function findSkill(
  args: string,
  context: CommandContext,
  usage: string
): { skill: Skill } | { result: CommandResult } {
  const skillName = args.trim();
  if (!skillName) {
    context.onOutput(usage, 'info');
    return { result: { success: false, message: 'Skill name required' } };
  }

  const skill = createLoader(context).loadAll().get(skillName);
  if (skill === undefined) {
    context.onOutput(`Skill not found: ${skillName}`, 'error');
    context.onOutput(getUserFriendlyMessage('NOT_FOUND', skillName), 'info');
    return { result: { success: false, message: 'Skill not found' } };
  }

  return { skill };
}

/**
 * Split off the first word. The remainder keeps its inner whitespace so
 * paths with repeated spaces survive.
 */
export function splitSubcommand(args: string): [string, string] {
  const match = /^\s*(\S*)\s*([\s\S]*)$/.exec(args);
  return [match?.[1] ?? '', match?.[2] ?? ''];
}

/**
 * Main skill command handler.
 * Routes to subcommands based on first argument.
 */
export const skillHandler: CommandHandler = async (args, context): Promise<CommandResult> => {
  const [subcommand, subArgs] = splitSubcommand(args);

  switch (subcommand.toLowerCase()) {
    case 'list':
    case '':
      return skillListHandler(subArgs, context);
    case 'info':
      return skillInfoHandler(subArgs, context);
    case 'show':
      return skillShowHandler(subArgs, context);
    case 'catalog':
      return skillCatalogHandler(subArgs, context);
    case 'validate':
      return skillValidateHandler(subArgs, context);
    default:
      context.onOutput(`Unknown subcommand: ${subcommand}`, 'warning');
      context.onOutput(SKILL_USAGE, 'info');
      return { success: false, message: 'Unknown subcommand' };
  }
};

/**
 * Handler for skill list.
 * Shows all registered skills grouped by tier.
 */
export const skillListHandler: CommandHandler = (_args, context): Promise<CommandResult> => {
  const loader = createLoader(context);
  const registry = loader.loadAll();
  const skills = registry.listAll();

  if (skills.length === 0) {
    context.onOutput('No skills found.', 'info');
    context.onOutput('\nSkills are loaded from:', 'info');
    for (const root of loader.getSearchRoots()) {
      context.onOutput(`  - ${root.path} (${root.location})`, 'info');
    }
    return Promise.resolve({ success: true, data: { skills: [] } });
  }

  context.onOutput(`\nRegistered Skills (${String(skills.length)})`, 'success');
  context.onOutput('══════════════════════════════', 'info');

  const groups: Array<[string, Skill[]]> = [
    ['[Project Skills]', registry.listByLocation('project')],
    ['[User Skills]', registry.listByLocation('user')],
  ];

  for (const [title, group] of groups) {
    if (group.length === 0) continue;
    context.onOutput(`\n${title}`, 'info');
    for (const skill of group) {
      context.onOutput(`  ${skill.name}`, 'success');
      context.onOutput(`    ${truncate(skill.description, 80)}`, 'info');
    }
  }

  context.onOutput('\nUse skill info <name> for details', 'info');

  return Promise.resolve({ success: true, data: { skills } });
};

/**
 * Handler for skill info.
 * Displays detailed information about a specific skill.
 */
export const skillInfoHandler: CommandHandler = (args, context): Promise<CommandResult> => {
  const found = findSkill(args, context, 'Usage: skill info <name>');
  if ('result' in found) {
    return Promise.resolve(found.result);
  }

  const { skill } = found;
  context.onOutput(`\nSkill: ${skill.name}`, 'success');
  context.onOutput('══════════════════════════════', 'info');
  context.onOutput(`\nDescription:\n  ${skill.description}`, 'info');
  context.onOutput(`\nLocation: ${skill.location}`, 'info');
  context.onOutput(`Path: ${skill.path}`, 'info');

  if (skill.license !== undefined && skill.license !== '') {
    context.onOutput(`License: ${skill.license}`, 'info');
  }

  if (skill.allowedTools.length > 0) {
    context.onOutput(`Allowed Tools: ${skill.allowedTools.join(', ')}`, 'info');
  }

  const lines = skill.content.split('\n');
  context.onOutput('\n─── Instructions Preview ───', 'info');
  for (const line of lines.slice(0, 30)) {
    context.onOutput(line, 'info');
  }
  if (lines.length > 30) {
    context.onOutput('... (truncated)', 'info');
  }

  return Promise.resolve({ success: true, data: skill });
};

/**
 * Handler for skill show.
 * Prints the prompt a skill expands to when invoked as a slash command.
 */
export const skillShowHandler: CommandHandler = (args, context): Promise<CommandResult> => {
  const found = findSkill(args, context, 'Usage: skill show <name>');
  if ('result' in found) {
    return Promise.resolve(found.result);
  }

  const prompt = generateSkillCommandPrompt(found.skill);
  context.onOutput(prompt);
  return Promise.resolve({ success: true, data: prompt });
};

/**
 * Handler for skill catalog.
 * Prints the <available_skills> catalog within a character budget.
 */
export const skillCatalogHandler: CommandHandler = (args, context): Promise<CommandResult> => {
  const rawBudget = args.trim();
  let budget = context.config?.skills.catalogCharBudget ?? DEFAULT_CATALOG_CHAR_BUDGET;

  if (rawBudget !== '') {
    const parsed = Number(rawBudget);
    if (!Number.isInteger(parsed) || parsed < 0) {
      context.onOutput(`Invalid budget: ${rawBudget}`, 'error');
      context.onOutput('Usage: skill catalog [budget]', 'info');
      return Promise.resolve({ success: false, message: 'Invalid budget' });
    }
    budget = parsed;
  }

  const catalog = createLoader(context).loadAll().generateCatalog(budget);
  context.onOutput(catalog);
  return Promise.resolve({ success: true, data: catalog });
};

/**
 * Read and check a skill directory or SKILL.md file.
 * Failures carry IO_ERROR, PARSE_ERROR or VALIDATION_ERROR.
 */
export async function checkSkillDocument(target: string): Promise<SkillResponse<SkillHeaderFields>> {
  let content: string;
  try {
    const stats = await stat(target);
    const documentPath = stats.isDirectory() ? join(target, SKILL_FILE_NAME) : target;
    content = await readFile(documentPath, 'utf-8');
  } catch (error) {
    return errorResponse('IO_ERROR', error instanceof Error ? error.message : 'Unknown error');
  }

  if (!hasFrontmatter(content)) {
    return errorResponse('PARSE_ERROR', 'SKILL.md must start with a --- delimited header');
  }

  const validation = validateHeader(parseFrontmatter(content).header);
  if (!validation.success) {
    return errorResponse('VALIDATION_ERROR', formatValidationErrors(validation.error).join('; '));
  }

  return successResponse(validation.data, 'Validation passed');
}

/**
 * Handler for skill validate.
 * Validates a skill directory or SKILL.md file.
 */
export const skillValidateHandler: CommandHandler = async (
  args,
  context
): Promise<CommandResult> => {
  const target = args.trim();

  if (!target) {
    context.onOutput('Usage: skill validate <path-to-SKILL.md>', 'info');
    return { success: false, message: 'Path required' };
  }

  context.onOutput(`\nValidating: ${target}`, 'info');
  context.onOutput('─────────────────────────', 'info');

  const response = await checkSkillDocument(target);
  if (isSkillError(response)) {
    if (response.error === 'IO_ERROR') {
      context.onOutput(`\nFailed to read file: ${response.message}`, 'error');
    } else {
      context.onOutput('\nValidation FAILED', 'error');
      for (const error of response.message.split('; ')) {
        context.onOutput(`  Error: ${error}`, 'error');
      }
    }
    context.onOutput(getUserFriendlyMessage(response.error, target), 'info');
    return { success: false, message: response.message, data: response };
  }

  const header = response.result;
  context.onOutput('\nValidation PASSED', 'success');
  context.onOutput('\nHeader:', 'info');
  context.onOutput(`  Name: ${header.name}`, 'info');
  context.onOutput(`  Description: ${truncate(header.description, 60)}`, 'info');

  if (header.license !== undefined && header.license !== '') {
    context.onOutput(`  License: ${header.license}`, 'info');
  }
  if (header['allowed-tools'].length > 0) {
    context.onOutput(`  Allowed Tools: ${header['allowed-tools'].join(', ')}`, 'info');
  }

  return { success: true, data: header };
};
