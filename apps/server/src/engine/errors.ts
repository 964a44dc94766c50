export type EngineErrorCode = 'INVALID_MOVE_VALUE' | 'INVALID_STATE_INDEX'

/**
 * Contract violation raised by the core model. These are caller bugs, never
 * recoverable conditions, so they are thrown rather than returned.
 */
export class EngineError extends Error {
  constructor(
    public readonly code: EngineErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'EngineError'
  }
}

export class InvalidMoveValueError extends EngineError {
  constructor(value: unknown) {
    super('INVALID_MOVE_VALUE', `Move must be 0, 1 or 2, got ${String(value)}`, { value })
    this.name = 'InvalidMoveValueError'
  }
}

export class InvalidStateIndexError extends EngineError {
  constructor(value: unknown) {
    super('INVALID_STATE_INDEX', `History state index must be 0..8, got ${String(value)}`, { value })
    this.name = 'InvalidStateIndexError'
  }
}
