import type { TranscriptionEngine } from '../plugins/index.js'
import type { AudioFragment, PartialTranscription } from '../types/index.js'
import type { AudioDecoder } from './decoder.js'
import { DecodeError, describeError, type DecodeErrorKind } from './errors.js'
import { silentLogger, type Logger } from './logger.js'

export interface ChunkProcessorConfig {
  /** Fragments must be strictly larger than this to be processed (default: 1000) */
  minChunkBytes?: number
  logger?: Logger
}

/**
 * Chunk Processor
 * Decodes and transcribes one fragment in isolation, off the ingestion path
 */
export class ChunkProcessor {
  private readonly minChunkBytes: number
  private readonly logger: Logger

  constructor(
    private readonly decoder: AudioDecoder,
    private readonly engine: TranscriptionEngine,
    config: ChunkProcessorConfig = {}
  ) {
    this.minChunkBytes = config.minChunkBytes ?? 1000
    this.logger = config.logger ?? silentLogger
  }

  /**
   * Whether a fragment carries enough data to be worth a decode attempt
   */
  shouldProcess(fragment: AudioFragment): boolean {
    return fragment.data.length > this.minChunkBytes
  }

  /**
   * Decode and transcribe one fragment. Never rejects: failures are logged and
   * nothing is emitted, since most fragments are not standalone containers.
   */
  async process(fragment: AudioFragment, emit: (result: PartialTranscription) => void): Promise<void> {
    try {
      const pcm = await this.decoder.decode(fragment.data, fragment.format)
      const text = (await this.engine.transcribe(pcm)).trim()

      if (text.length === 0) {
        this.logger.debug('Chunk produced no text', { chunk: fragment.sequence })
        return
      }

      emit({ text, isFinal: false, chunk: fragment.sequence })
    } catch (error) {
      if (isExpectedChunkFailure(error)) {
        this.logger.debug('Chunk not decodable on its own', { chunk: fragment.sequence, kind: error.kind })
        return
      }
      this.logger.warn('Error processing chunk', { chunk: fragment.sequence, error: describeError(error) })
    }
  }
}

const EXPECTED_CHUNK_FAILURES = new Set<DecodeErrorKind>(['too_small', 'all_strategies_failed', 'empty_output'])

/**
 * Decode failures that are the steady state of a live stream
 */
function isExpectedChunkFailure(error: unknown): error is DecodeError {
  return error instanceof DecodeError && EXPECTED_CHUNK_FAILURES.has(error.kind)
}
