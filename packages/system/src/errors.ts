/**
 * Argument errors
 *
 * Every synchronous rejection of a caller's argument is an ArgumentError.
 * Validation goes through zod schemas; a failed parse is rethrown with the
 * argument name and the first issue.
 */

import type { ZodType, ZodTypeDef } from 'zod'

export class ArgumentError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ArgumentError'
  }
}

/**
 * Parse `value` against `schema` or throw an ArgumentError naming `argument`
 *
 * @example
 * ```ts
 * const width = validate(positiveIntSchema, Math.trunc(lineWidth), 'line width')
 * ```
 */
export function validate<TOutput, TInput>(
  schema: ZodType<TOutput, ZodTypeDef, TInput>,
  value: unknown,
  argument: string,
): TOutput {
  const result = schema.safeParse(value)
  if (result.success) return result.data

  const issue = result.error.issues[0]
  const path = issue && issue.path.length > 0 ? ` at [${issue.path.join(', ')}]` : ''
  const detail = issue ? issue.message : result.error.message
  throw new ArgumentError(`invalid ${argument}${path}: ${detail}`)
}
