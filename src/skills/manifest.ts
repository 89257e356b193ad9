/**
 * Zod schemas for SKILL.md header fields.
 *
 * Only `name` and `description` are required. The optional fields are
 * coerced where a sensible reading exists and dropped otherwise, so a
 * malformed optional field never costs the whole skill.
 */

import { z } from 'zod';

// -----------------------------------------------------------------------------
// Schemas
// -----------------------------------------------------------------------------

/**
 * Schema for skill name field (non-empty after trimming).
 */
export const SkillNameSchema = z
  .string()
  .trim()
  .min(1, 'Skill name cannot be empty')
  .describe('Skill identifier, unique within a registry');

/**
 * Schema for skill description field (non-empty after trimming).
 */
export const SkillDescriptionSchema = z
  .string()
  .trim()
  .min(1, 'Skill description cannot be empty')
  .describe('What the skill does and when to use it');

const ToolNameSchema = z.union([z.string(), z.number(), z.boolean()]);

/**
 * Schema for allowed-tools field.
 * - List format: ["Bash", "Read"] (order kept, null entries dropped)
 * - Scalar format: "Bash" is read as a one-element list
 */
export const AllowedToolsSchema = z
  .union([ToolNameSchema, z.array(ToolNameSchema.nullable())])
  .optional()
  .transform((value): string[] => {
    if (value === undefined) return [];
    const entries = Array.isArray(value) ? value : [value];
    return entries.filter((entry) => entry !== null).map((entry) => String(entry));
  })
  .catch([])
  .describe('Tool names the skill is scoped to');

export const LicenseSchema = z.string().optional().catch(undefined).describe('License name');

/**
 * Schema for metadata field. Kept as an uninterpreted mapping.
 */
export const MetadataSchema = z
  .record(z.string(), z.unknown())
  .optional()
  .catch(undefined)
  .describe('Arbitrary key-value mapping for extensions');

/**
 * SKILL.md header schema. Unknown keys are ignored.
 */
export const SkillHeaderSchema = z.object({
  name: SkillNameSchema,
  description: SkillDescriptionSchema,
  license: LicenseSchema,
  metadata: MetadataSchema,
  'allowed-tools': AllowedToolsSchema,
});

/**
 * Header after validation and coercion.
 */
export type SkillHeaderFields = z.infer<typeof SkillHeaderSchema>;

// -----------------------------------------------------------------------------
// Validation Functions
// -----------------------------------------------------------------------------

/**
 * Validate a decoded header mapping.
 *
 * @param data - Header produced by the frontmatter parser
 */
export function validateHeader(data: unknown): z.ZodSafeParseResult<SkillHeaderFields> {
  return SkillHeaderSchema.safeParse(data);
}

/**
 * Format Zod validation errors into readable messages.
 */
export function formatValidationErrors(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return `${path}${issue.message}`;
  });
}
