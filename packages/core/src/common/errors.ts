/**
 * Typed error class for Mission Studio operations.
 */

export type ErrorCode =
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'VALIDATION_ERROR'
  | 'IN_USE'
  | 'AUTH_ERROR'
  | 'SERVICE_ERROR'
  | 'FORMAT_ERROR'
  | 'IO_ERROR'
  | 'DB_ERROR'

export class StudioError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string) {
    super(message)
    this.name = 'StudioError'
    this.code = code
  }

  static notFound(entity: string, id: string): StudioError {
    return new StudioError('NOT_FOUND', `${entity} not found: ${id}`)
  }

  static conflict(message: string): StudioError {
    return new StudioError('CONFLICT', message)
  }

  static validation(message: string): StudioError {
    return new StudioError('VALIDATION_ERROR', message)
  }

  static inUse(message: string): StudioError {
    return new StudioError('IN_USE', message)
  }

  static auth(message: string): StudioError {
    return new StudioError('AUTH_ERROR', message)
  }

  static service(message: string): StudioError {
    return new StudioError('SERVICE_ERROR', message)
  }

  static format(message: string): StudioError {
    return new StudioError('FORMAT_ERROR', message)
  }

  static io(message: string): StudioError {
    return new StudioError('IO_ERROR', message)
  }

  static db(message: string): StudioError {
    return new StudioError('DB_ERROR', message)
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
