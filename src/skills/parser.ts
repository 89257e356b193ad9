/**
 * YAML frontmatter parser for SKILL.md files.
 * Splits a document into its header mapping and body text.
 */

import { parse as parseYaml } from 'yaml';
import type { SkillDocument, SkillHeader } from './types.js';

/**
 * Opening `---` line, optional header block, closing `---` line.
 * The closing delimiter must sit on its own line.
 */
const FRONTMATTER_PATTERN = /^---[ \t]*\r?\n(?:([\s\S]*?)\r?\n)?---[ \t]*(?:\r?\n|$)/;

const BYTE_ORDER_MARK = '\uFEFF';

function stripByteOrderMark(raw: string): string {
  return raw.startsWith(BYTE_ORDER_MARK) ? raw.slice(BYTE_ORDER_MARK.length) : raw;
}

function isHeaderMapping(value: unknown): value is SkillHeader {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Split raw SKILL.md text into header and body.
 *
 * Never throws. Text without a complete frontmatter block, or whose block is
 * not a YAML mapping, comes back as `{ header: {}, body: raw }`. A leading
 * byte order mark is ignored.
 *
 * @param raw - Raw SKILL.md file content
 */
export function parseFrontmatter(raw: string): SkillDocument {
  const text = stripByteOrderMark(raw);
  const match = FRONTMATTER_PATTERN.exec(text);
  if (match === null) {
    return { header: {}, body: raw };
  }

  const block = match[1] ?? '';
  const body = text.slice(match[0].length);

  let decoded: unknown;
  try {
    decoded = parseYaml(block, { logLevel: 'error' });
  } catch {
    return { header: {}, body: raw };
  }

  if (decoded === null || decoded === undefined) {
    return { header: {}, body };
  }

  if (!isHeaderMapping(decoded)) {
    return { header: {}, body: raw };
  }

  return { header: decoded, body };
}

/**
 * Check whether text opens with a complete frontmatter block.
 * Doesn't decode the YAML.
 */
export function hasFrontmatter(raw: string): boolean {
  return FRONTMATTER_PATTERN.test(stripByteOrderMark(raw));
}
