/**
 * Error type definitions.
 */

/**
 * Validation issue structure.
 */
export interface ValidationIssue {
  /** Field path (e.g., "basePath" or "logger.level") */
  field: string;
  /** Error message */
  message: string;
  /** Error kind (e.g., "invalid_type" from zod, "StringMinLength" from TypeBox) */
  code?: string;
}

/**
 * Serialized error structure.
 */
export interface ErrorPayload {
  error: {
    message: string;
    code: string;
    details?: unknown;
    stack?: string[];
  };
}
