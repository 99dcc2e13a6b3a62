/**
 * Entry validation for workflow requests and learning callbacks.
 */

import { z } from 'zod'
import { ValidationFailureError } from './errors.js'
import type { WorkflowRequest } from './types.js'

export const WorkflowRequestSchema = z
  .object({
    repositoryUrl: z.string().trim().min(1, 'repositoryUrl is required'),
    credential: z.string().min(1, 'credential is required'),
    additionalContext: z.string().max(10_000).optional(),
    pipelineOnly: z.boolean().optional(),
    branchName: z
      .string()
      .regex(/^[\w.\-/]+$/, 'branchName may only contain letters, digits, ".", "-", "_" and "/"')
      .optional(),
  })
  .strict()

/** Body posted by the learning job of a generated pipeline */
export const LearningCallbackSchema = z.object({
  branch: z.string().min(1, 'branch is required'),
  pipelineId: z.union([z.string(), z.number().int()]).transform(String).optional(),
  projectUrl: z.string().optional(),
})

export type LearningCallback = z.infer<typeof LearningCallbackSchema>

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  )
}

/** @throws {ValidationFailureError} listing every invalid field */
export function parseWorkflowRequest(input: unknown): WorkflowRequest {
  const parsed = WorkflowRequestSchema.safeParse(input)
  if (!parsed.success) {
    throw new ValidationFailureError('Invalid workflow request', issuesOf(parsed.error))
  }
  return parsed.data
}

/** @throws {ValidationFailureError} listing every invalid field */
export function parseLearningCallback(input: unknown): LearningCallback {
  const parsed = LearningCallbackSchema.safeParse(input)
  if (!parsed.success) {
    throw new ValidationFailureError('Invalid learning callback', issuesOf(parsed.error))
  }
  return parsed.data
}
