import type { z, ZodError } from 'zod'
import { InvalidOptionsError, type OptionIssue } from '../errors'

/**
 * Flatten zod issues into dotted paths and messages.
 */
export function issuesOf(error: ZodError): OptionIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }))
}

/**
 * Validate an options object and apply its defaults.
 * @throws InvalidOptionsError if the input does not match the schema
 */
export function parseOptions<T extends z.ZodTypeAny>(schema: T, input: unknown, subject: string): z.output<T> {
  const result = schema.safeParse(input)
  if (!result.success) {
    const issues = issuesOf(result.error)
    const first = issues[0]
    throw new InvalidOptionsError(
      `Invalid ${subject} options: ${first ? `${first.path}: ${first.message}` : 'validation failed'}`,
      issues,
    )
  }
  return result.data
}
