/**
 * Error Messages with Actionable Suggestions
 *
 * Provides user-friendly error messages that include:
 * - Clear description of what went wrong
 * - Actionable suggestions for resolution
 * - Alternative approaches when available
 */

import { CAPABILITIES } from '../types/intelligence.js';

/**
 * Error message builder for consistent formatting
 */
export interface ErrorMessageOptions {
  /** Main error description */
  message: string;
  /** Suggested actions to resolve the issue */
  suggestions?: string[];
  /** Alternative approaches */
  alternatives?: string[];
}

/**
 * Build a formatted error message with suggestions
 */
export function buildErrorMessage(options: ErrorMessageOptions): string {
  const parts: string[] = [options.message];

  if (options.suggestions && options.suggestions.length > 0) {
    if (options.suggestions.length === 1) {
      parts.push(options.suggestions[0]);
    } else {
      parts.push('Suggestions:');
      options.suggestions.forEach((s) => parts.push(`  - ${s}`));
    }
  }

  if (options.alternatives && options.alternatives.length > 0) {
    if (options.alternatives.length === 1) {
      parts.push(`Alternative: ${options.alternatives[0]}`);
    } else {
      parts.push('Alternatives:');
      options.alternatives.forEach((a) => parts.push(`  - ${a}`));
    }
  }

  return parts.join('\n');
}

// =============================================================================
// CAPABILITY ERRORS
// =============================================================================

/**
 * Recorded on a task whose capability has no registered handler
 */
export function handlerMissingError(capability: string, registered: string[]): string {
  return buildErrorMessage({
    message: `No handler registered for capability "${capability}".`,
    suggestions: [
      `Register one with registry.register('${capability}', handler)`,
      registered.length > 0
        ? `Registered capabilities: ${registered.join(', ')}`
        : 'No capability handlers are registered',
    ],
  });
}

/**
 * Error when a capability name is not recognised
 */
export function unknownCapabilityError(capability: string): string {
  const similar = findSimilarStrings(capability, [...CAPABILITIES], 3);
  return buildErrorMessage({
    message: `Unknown capability: "${capability}".`,
    suggestions: similar.length > 0 ? [`Did you mean: ${similar.join(', ')}?`] : undefined,
    alternatives: [`Valid capabilities: ${CAPABILITIES.join(', ')}`],
  });
}

/**
 * Error when the handlers module does not export a registration function
 */
export function handlerModuleExportError(specifier: string, exportName: string): string {
  return buildErrorMessage({
    message: `Handlers module "${specifier}" does not export a function named ${exportName}.`,
    suggestions: [
      `Export it as: export function ${exportName}(registry) { ... }`,
      'Check TAB_INTEL_HANDLERS_MODULE or hub.handlersModule in .tabintelrc',
    ],
  });
}

// =============================================================================
// TOOL ERRORS
// =============================================================================

/**
 * Error when an unknown tool is requested
 */
export function unknownToolError(toolName: string, availableTools: string[]): string {
  const similar = findSimilarStrings(toolName, availableTools, 3);
  return buildErrorMessage({
    message: `Unknown tool: "${toolName}".`,
    suggestions: similar.length > 0 ? [`Did you mean: ${similar.join(', ')}?`] : undefined,
    alternatives: [
      `Available tools: ${availableTools.slice(0, 10).join(', ')}${availableTools.length > 10 ? '...' : ''}`,
    ],
  });
}

/**
 * Error when a task id does not match any known task
 */
export function taskNotFoundError(taskId: string): string {
  return buildErrorMessage({
    message: `Task not found: "${taskId}".`,
    suggestions: [
      'Verify the task ID is correct',
      'Finished tasks are only kept for five minutes',
      'Use get_active_tasks to see queued and running tasks',
    ],
  });
}

// =============================================================================
// UTILITY FUNCTIONS
// =============================================================================

/**
 * Find similar strings using simple edit distance
 */
function findSimilarStrings(target: string, candidates: string[], maxResults: number): string[] {
  const targetLower = target.toLowerCase();

  return candidates
    .map((candidate) => ({
      candidate,
      distance: levenshteinDistance(targetLower, candidate.toLowerCase()),
    }))
    .filter(({ distance }) => distance <= 3) // Max 3 edits
    .sort((a, b) => a.distance - b.distance)
    .slice(0, maxResults)
    .map(({ candidate }) => candidate);
}

/**
 * Simple Levenshtein distance implementation
 */
function levenshteinDistance(a: string, b: string): number {
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  const matrix: number[][] = [];

  for (let i = 0; i <= b.length; i++) {
    matrix[i] = [i];
  }
  for (let j = 0; j <= a.length; j++) {
    matrix[0][j] = j;
  }

  for (let i = 1; i <= b.length; i++) {
    for (let j = 1; j <= a.length; j++) {
      const cost = a[j - 1] === b[i - 1] ? 0 : 1;
      matrix[i][j] = Math.min(
        matrix[i - 1][j] + 1, // deletion
        matrix[i][j - 1] + 1, // insertion
        matrix[i - 1][j - 1] + cost // substitution
      );
    }
  }

  return matrix[b.length][a.length];
}
