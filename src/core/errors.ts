/**
 * Base class for every error raised by the transcription pipeline
 */
export class TranscriptionError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message)
    this.name = 'TranscriptionError'
  }
}

export type DecodeErrorKind =
  | 'too_small'
  | 'resample_invalid'
  | 'empty_output'
  | 'all_strategies_failed'

/**
 * A single failed strategy attempt recorded by the decoder
 */
export interface DecodeAttempt {
  strategy: string
  reason: string
}

/**
 * Raised when audio bytes cannot be turned into canonical PCM
 */
export class DecodeError extends TranscriptionError {
  constructor(
    public readonly kind: DecodeErrorKind,
    message: string,
    public readonly attempts: readonly DecodeAttempt[] = []
  ) {
    super(message, `decode_${kind}`)
    this.name = 'DecodeError'
  }
}

/**
 * Raised when a session is finalized without any received audio
 */
export class EmptyAudioError extends TranscriptionError {
  constructor(message: string = 'No audio data received') {
    super(message, 'empty_audio')
    this.name = 'EmptyAudioError'
  }
}

/**
 * Raised when work is requested before a transcription engine is attached
 */
export class EngineNotReadyError extends TranscriptionError {
  constructor(message: string = 'Model not initialized') {
    super(message, 'engine_not_ready')
    this.name = 'EngineNotReadyError'
  }
}

/**
 * Raised when an engine cannot be initialized (missing or unusable assets)
 */
export class EngineInitError extends TranscriptionError {
  constructor(message: string, public readonly cause?: unknown) {
    super(message, 'engine_init_failed')
    this.name = 'EngineInitError'
  }
}

/**
 * Raised for a malformed inbound message
 */
export class ProtocolError extends TranscriptionError {
  constructor(message: string) {
    super(message, 'protocol_error')
    this.name = 'ProtocolError'
  }
}

export type SessionLimitReason = 'max_bytes' | 'max_chunks'

/**
 * Raised when a fragment would push a session over its configured limits
 */
export class SessionLimitError extends TranscriptionError {
  constructor(public readonly reason: SessionLimitReason) {
    super(`Failed to add audio chunk (session limit exceeded: ${reason})`, 'session_limit')
    this.name = 'SessionLimitError'
  }
}

/**
 * Message text of an unknown thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
