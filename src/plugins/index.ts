import type { CanonicalPcm } from '../types/index.js'

/**
 * Transcription engine interface
 * Converts canonical PCM to text. Implementations must tolerate concurrent calls
 * and must not block the event loop for the duration of inference.
 */
export interface TranscriptionEngine {
  /**
   * Engine name for identification
   */
  readonly name: string

  /**
   * Transcribe a canonical PCM buffer
   * @returns Transcribed text (possibly empty)
   */
  transcribe(pcm: CanonicalPcm): Promise<string>
}

export { WhisperCppEngine, type WhisperCppConfig } from './whisper-cpp.js'
