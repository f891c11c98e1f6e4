/**
 * Validation of queueTask input
 */

import { z } from 'zod';
import { TaskValidationError } from '../types/errors.js';
import { TASK_PRIORITIES, type QueueTaskRequest } from '../types/intelligence.js';
import { capabilitySchema } from '../utils/config-schemas.js';

export const taskPrioritySchema = z.enum(TASK_PRIORITIES);

export const queueTaskRequestSchema = z.object({
  id: z.string().min(1).optional(),
  tabId: z.string().min(1, 'tabId must not be empty'),
  name: z.string().min(1, 'name must not be empty'),
  description: z.string().optional(),
  capability: capabilitySchema,
  priority: taskPrioritySchema.optional(),
  parameters: z.record(z.unknown()).optional(),
  estimatedDurationMs: z.number().int().positive().optional(),
});

/**
 * Parse a request, throwing TaskValidationError listing every issue
 */
export function parseQueueTaskRequest(input: unknown): QueueTaskRequest {
  const result = queueTaskRequestSchema.safeParse(input);
  if (!result.success) {
    throw new TaskValidationError(
      result.error.issues.map((issue) => {
        const path = issue.path.join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
      })
    );
  }
  return result.data;
}
