/**
 * Sample rate of canonical PCM handed to the transcription engine
 */
export const CANONICAL_SAMPLE_RATE = 48000

/**
 * One raw chunk of compressed audio as received from the transport
 */
export interface AudioFragment {
  /** Sequence number, starting at 1 and strictly increasing per session */
  readonly sequence: number
  /** Raw bytes exactly as received */
  readonly data: Buffer
  /** Declared container format (e.g. "webm") */
  readonly format: string
  /** Nominal sample rate declared by the sender */
  readonly sampleRate: number
}

/**
 * Mono, 48 kHz, 16-bit linear PCM
 */
export interface CanonicalPcm {
  samples: Int16Array
  sampleRate: typeof CANONICAL_SAMPLE_RATE
}

/**
 * Decoded audio data with format info, before normalization
 */
export interface DecodedAudio {
  /** Interleaved 16-bit signed samples */
  pcm: Int16Array
  /** Sample rate in Hz */
  sampleRate: number
  /** Number of interleaved channels */
  channels: number
}

/**
 * Best-effort transcription of a single fragment
 */
export interface PartialTranscription {
  text: string
  isFinal: false
  /** Sequence number of the originating fragment */
  chunk: number
}

/**
 * Authoritative transcription over every fragment of a session
 */
export interface FinalTranscription {
  text: string
  isFinal: true
}

export type TranscriptionResult = PartialTranscription | FinalTranscription

/**
 * Streaming session state
 */
export interface TranscriptionSession {
  /** Unique session identifier */
  sessionId: string
  /** Received fragments in arrival (and sequence) order */
  fragments: AudioFragment[]
  /** Number of fragments accepted so far */
  fragmentCount: number
  /** Chunk-processing units that have not settled yet */
  pending: Set<Promise<void>>
  /** Session start timestamp */
  startTime: number
  /** Total bytes received */
  totalBytes: number
  /** Set once the session can no longer accept fragments */
  terminal: boolean
}
