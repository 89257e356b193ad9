/**
 * Structured response types shared by the skill tool and command handlers.
 *
 * The skill pipeline itself never throws: it degrades to "this skill is
 * unavailable". Public boundaries that answer a caller use the discriminated
 * union below instead of exceptions.
 */

// -----------------------------------------------------------------------------
// Error Codes
// -----------------------------------------------------------------------------

/**
 * Error codes for skill operations.
 */
export type SkillErrorCode =
  | 'VALIDATION_ERROR' // Invalid input parameters
  | 'NOT_FOUND' // Skill or file not found
  | 'IO_ERROR' // File system errors
  | 'PARSE_ERROR' // Malformed SKILL.md
  | 'CONFIG_ERROR' // Configuration issues
  | 'UNKNOWN'; // Unexpected errors

// -----------------------------------------------------------------------------
// Response Types
// -----------------------------------------------------------------------------

/**
 * Success response from a skill operation.
 */
export interface SkillSuccessResponse<T = unknown> {
  success: true;
  result: T;
  message: string;
}

/**
 * Error response from a skill operation.
 */
export interface SkillErrorResponse {
  success: false;
  error: SkillErrorCode;
  message: string;
}

/**
 * Discriminated union for skill responses.
 */
export type SkillResponse<T = unknown> = SkillSuccessResponse<T> | SkillErrorResponse;

// -----------------------------------------------------------------------------
// Helper Functions
// -----------------------------------------------------------------------------

/**
 * Create a success response.
 */
export function successResponse<T>(result: T, message: string): SkillSuccessResponse<T> {
  return { success: true, result, message };
}

/**
 * Create an error response.
 */
export function errorResponse(error: SkillErrorCode, message: string): SkillErrorResponse {
  return { success: false, error, message };
}

// -----------------------------------------------------------------------------
// Type Guards
// -----------------------------------------------------------------------------

export function isSkillSuccess<T>(response: SkillResponse<T>): response is SkillSuccessResponse<T> {
  return response.success;
}

export function isSkillError<T>(response: SkillResponse<T>): response is SkillErrorResponse {
  return !response.success;
}

/**
 * Generate a user-facing message for an error code.
 *
 * @param error - The error code
 * @param subject - Optional skill name or path the error refers to
 */
export function getUserFriendlyMessage(error: SkillErrorCode, subject?: string): string {
  const target = subject !== undefined ? ` '${subject}'` : '';

  switch (error) {
    case 'VALIDATION_ERROR':
      return `Invalid skill request${target}.`;
    case 'NOT_FOUND':
      return `Skill${target} was not found. Run "skills list" to see available skills.`;
    case 'IO_ERROR':
      return `Could not read skill${target} from disk.`;
    case 'PARSE_ERROR':
      return `Skill${target} has a malformed SKILL.md header.`;
    case 'CONFIG_ERROR':
      return 'Configuration error. Please check your settings.';
    default:
      return 'An unexpected error occurred.';
  }
}
