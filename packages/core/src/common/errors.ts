/**
 * Typed error class for vault indexing and search operations.
 */

export type ErrorCode =
  | 'CONFIG_ERROR'
  | 'IO_ERROR'
  | 'PARSE_ERROR'
  | 'PROVIDER_ERROR'
  | 'PROTOCOL_ERROR'
  | 'DB_ERROR'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'CANCELLED'

export class VaultError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'VaultError'
    this.code = code
  }

  static config(message: string): VaultError {
    return new VaultError('CONFIG_ERROR', message)
  }

  static io(message: string, cause?: unknown): VaultError {
    return new VaultError('IO_ERROR', message, { cause })
  }

  static parse(message: string, cause?: unknown): VaultError {
    return new VaultError('PARSE_ERROR', message, { cause })
  }

  static provider(message: string, cause?: unknown): VaultError {
    return new VaultError('PROVIDER_ERROR', message, { cause })
  }

  static protocol(message: string): VaultError {
    return new VaultError('PROTOCOL_ERROR', message)
  }

  static db(message: string, cause?: unknown): VaultError {
    return new VaultError('DB_ERROR', message, { cause })
  }

  static notFound(entity: string, id: string): VaultError {
    return new VaultError('NOT_FOUND', `${entity} not found: ${id}`)
  }

  static validation(message: string): VaultError {
    return new VaultError('VALIDATION_ERROR', message)
  }

  static cancelled(): VaultError {
    return new VaultError('CANCELLED', 'Operation cancelled')
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
