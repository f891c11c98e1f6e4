/**
 * MCP Response Formatters
 *
 * Utilities for formatting hub results for MCP tool consumption:
 * - Versioned JSON payloads
 * - Structured error responses carrying the hub's error codes
 */

import { ZodError } from 'zod';
import { isHubError } from '../types/errors.js';
import { ConfigValidationError, formatConfigErrors } from '../utils/config-schemas.js';

/**
 * Version of the JSON payloads returned by the tools
 */
export const RESPONSE_SCHEMA_VERSION = '1.0';

/**
 * MCP response content type
 * This matches the expected return type for MCP tool handlers
 */
export type McpResponse = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

/**
 * Machine-readable body of an error response
 */
export interface StructuredError {
  error: string;
  code: string;
  name: string;
}

/**
 * Create a versioned JSON response for MCP tools
 */
export function jsonResponse(data: object, indent: number = 2): McpResponse {
  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify({ schemaVersion: RESPONSE_SCHEMA_VERSION, ...data }, null, indent),
      },
    ],
  };
}

/**
 * Classify an error into a code the client can branch on
 */
export function buildStructuredError(error: unknown): StructuredError {
  if (isHubError(error)) {
    return { error: error.message, code: error.code, name: error.name };
  }
  if (error instanceof ConfigValidationError) {
    return { error: error.message, code: 'INVALID_CONFIGURATION', name: error.name };
  }
  if (error instanceof ZodError) {
    return {
      error: `Invalid arguments:\n${formatConfigErrors(error)}`,
      code: 'INVALID_ARGUMENTS',
      name: 'ValidationError',
    };
  }
  if (error instanceof Error) {
    return { error: error.message, code: 'INTERNAL_ERROR', name: error.name };
  }
  return { error: String(error), code: 'INTERNAL_ERROR', name: 'Error' };
}

/**
 * Create a structured error response for MCP tools
 */
export function errorResponse(error: unknown, code?: string): McpResponse {
  const structured = buildStructuredError(error);
  return {
    content: [
      { type: 'text', text: JSON.stringify(code ? { ...structured, code } : structured) },
    ],
    isError: true,
  };
}
