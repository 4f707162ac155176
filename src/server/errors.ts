export type ServerErrorCode =
  | 'ADDRESS_IN_USE'
  | 'PERMISSION_DENIED'
  | 'ALREADY_RUNNING'
  | 'LISTEN_FAILED'

export class ServerStartError extends Error {
  constructor(
    public readonly code: ServerErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'ServerStartError'
  }
}

/**
 * Translate a listen() failure into a ServerStartError.
 */
export function toStartError(err: unknown, host: string, port: number): ServerStartError {
  const errno = err && typeof err === 'object' && 'code' in err ? err.code : undefined
  if (errno === 'EADDRINUSE') {
    return new ServerStartError('ADDRESS_IN_USE', `Address already in use: ${host}:${port}`, { cause: err })
  }
  if (errno === 'EACCES') {
    return new ServerStartError('PERMISSION_DENIED', `Permission denied binding ${host}:${port}`, { cause: err })
  }
  const reason = err instanceof Error ? err.message : String(err)
  return new ServerStartError('LISTEN_FAILED', `Failed to listen on ${host}:${port}: ${reason}`, { cause: err })
}
