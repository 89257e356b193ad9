/**
 * Skill value object built from a parsed SKILL.md.
 */

import { readFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { validateHeader } from './manifest.js';
import { parseFrontmatter } from './parser.js';
import { escapeXml } from './prompt.js';
import type { SkillHeader, SkillLocation, SkillProps } from './types.js';

/**
 * Drop blank lines at either end of a body, keeping inner spacing.
 */
export function trimBlankLines(text: string): string {
  const trimmed = text.replace(/^(?:[ \t]*\r?\n)+/, '').replace(/(?:\r?\n[ \t]*)+$/, '');
  return trimmed.trim() === '' ? '' : trimmed;
}

/**
 * An immutable skill: metadata, instruction content and where it came from.
 */
export class Skill {
  readonly name: string;
  readonly description: string;
  readonly content: string;
  readonly path: string;
  readonly location: SkillLocation;
  readonly allowedTools: readonly string[];
  readonly license?: string;
  readonly metadata?: Readonly<Record<string, unknown>>;

  constructor(props: SkillProps) {
    this.name = props.name;
    this.description = props.description;
    this.content = props.content;
    this.path = props.path;
    this.location = props.location;
    this.allowedTools = Object.freeze([...(props.allowedTools ?? [])]);
    this.license = props.license;
    this.metadata = props.metadata;
    Object.freeze(this);
  }

  /**
   * Build a skill from a parsed document.
   *
   * @param documentPath - Path of the SKILL.md the header came from
   * @param header - Decoded header mapping
   * @param body - Document body
   * @param location - Tier of the search root the document was found under
   * @returns The skill, or undefined when name or description is missing
   */
  static fromDocument(
    documentPath: string,
    header: SkillHeader,
    body: string,
    location: SkillLocation
  ): Skill | undefined {
    const validation = validateHeader(header);
    if (!validation.success) {
      return undefined;
    }

    const fields = validation.data;
    return new Skill({
      name: fields.name,
      description: fields.description,
      content: trimBlankLines(body),
      path: dirname(documentPath),
      location,
      allowedTools: fields['allowed-tools'],
      license: fields.license,
      metadata: fields.metadata,
    });
  }

  /**
   * Read and parse a SKILL.md file.
   *
   * @returns The skill, or undefined if the file is unreadable or incomplete
   */
  static fromSkillMd(documentPath: string, location: SkillLocation = 'project'): Skill | undefined {
    let raw: string;
    try {
      raw = readFileSync(documentPath, 'utf-8');
    } catch {
      return undefined;
    }

    const { header, body } = parseFrontmatter(raw);
    return Skill.fromDocument(documentPath, header, body, location);
  }

  /**
   * Compact catalog entry without the instruction body.
   */
  toSummaryFragment(): string {
    return `<skill>
<name>${escapeXml(this.name)}</name>
<description>${escapeXml(this.description)}</description>
<location>${this.location}</location>
</skill>`;
  }

  /**
   * Full instruction block handed to a model when the skill is activated.
   */
  toPromptBlock(): string {
    return `Loading: ${this.name}
Base directory: ${this.path}

${this.content}`;
  }

  toString(): string {
    return `Skill(name=${this.name}, location=${this.location})`;
  }
}
