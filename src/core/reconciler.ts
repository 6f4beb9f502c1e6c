import type { TranscriptionEngine } from '../plugins/index.js'
import type { AudioFragment, FinalTranscription } from '../types/index.js'
import type { AudioDecoder } from './decoder.js'
import { EmptyAudioError } from './errors.js'
import { silentLogger, type Logger } from './logger.js'

/**
 * Concatenate fragment payloads in ascending sequence order
 */
export function concatenateFragments(fragments: readonly AudioFragment[]): Buffer {
  const ordered = [...fragments].sort((a, b) => a.sequence - b.sequence)
  return Buffer.concat(ordered.map((fragment) => fragment.data))
}

/**
 * Session Reconciler
 * Produces the single authoritative transcription over every fragment of a session
 */
export class SessionReconciler {
  private readonly logger: Logger

  constructor(
    private readonly decoder: AudioDecoder,
    private readonly engine: TranscriptionEngine,
    logger?: Logger
  ) {
    this.logger = logger ?? silentLogger
  }

  /**
   * Decode and transcribe the whole session. Failures propagate to the caller.
   * @throws EmptyAudioError when there are no fragments
   */
  async reconcile(fragments: readonly AudioFragment[]): Promise<FinalTranscription> {
    if (fragments.length === 0) {
      throw new EmptyAudioError()
    }

    const ordered = [...fragments].sort((a, b) => a.sequence - b.sequence)
    const completeAudio = concatenateFragments(ordered)
    if (completeAudio.length === 0) {
      throw new EmptyAudioError('Empty audio data')
    }

    // The first fragment carries the container header for the whole stream
    const format = ordered[0]?.format ?? 'webm'
    const startedAt = Date.now()

    const pcm = await this.decoder.decode(completeAudio, format)
    const text = (await this.engine.transcribe(pcm)).trim()

    this.logger.info('Final transcription complete', {
      fragments: fragments.length,
      bytes: completeAudio.length,
      audioSeconds: pcm.samples.length / pcm.sampleRate,
      durationMs: Date.now() - startedAt
    })

    return { text, isFinal: true }
  }
}
