import { z } from 'zod'

export type HandlerResponse<T> =
  | { success: true; data: T; message: string }
  | { success: false; error: string; message: string; code?: string }

export function ok<T>(data: T, message: string): HandlerResponse<T> {
  return { success: true, data, message }
}

export function failure<T>(error: unknown, message: string): HandlerResponse<T> {
  if (error instanceof z.ZodError) {
    return {
      success: false,
      error: error.issues
        .map((issue) =>
          issue.path.length > 0
            ? `${issue.path.join('.')}: ${issue.message}`
            : issue.message
        )
        .join('; '),
      message,
      code: 'invalid_event'
    }
  }
  return {
    success: false,
    error: error instanceof Error ? error.message : 'Unknown error',
    message,
    code: hasCode(error) ? error.code : undefined
  }
}

function hasCode(error: unknown): error is { code: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string'
  )
}
