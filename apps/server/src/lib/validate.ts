import type { Context } from 'hono'
import type { z } from 'zod'

export interface ValidationIssue {
  /** Dotted path into the body, e.g. `calls.2.bearingText` */
  path: string
  message: string
}

/** Issue list with full paths, so a bad call can be located by its index. */
export function describeIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }))
}

/**
 * Parse and validate the JSON body with a Zod schema. Returns a 400 response
 * carrying top-level `fields` and path-level `issues` on failure.
 */
export async function parseBody<T extends z.ZodTypeAny>(
  c: Context,
  schema: T,
): Promise<z.output<T> | Response> {
  let body: unknown
  try {
    body = await c.req.json()
  } catch {
    return c.json({ error: 'Invalid JSON body.' }, 400)
  }

  const result = schema.safeParse(body)
  if (!result.success) {
    return c.json({
      error: 'Validation failed.',
      fields: result.error.flatten().fieldErrors,
      issues: describeIssues(result.error),
    }, 400)
  }

  return result.data
}

/** Check if a parseBody result is a Response (validation error). */
export function isResponse(value: unknown): value is Response {
  return value instanceof Response
}
