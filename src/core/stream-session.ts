import type { TranscriptionEngine } from '../plugins/index.js'
import type { PartialTranscription } from '../types/index.js'
import { ChunkProcessor } from './chunk-processor.js'
import type { AudioDecoder } from './decoder.js'
import {
  EmptyAudioError,
  EngineNotReadyError,
  ProtocolError,
  SessionLimitError,
  describeError
} from './errors.js'
import { silentLogger, type Logger } from './logger.js'
import {
  errorMessage,
  parseInboundMessage,
  processingMessage,
  receivedMessage,
  transcriptionMessage,
  type AudioChunkMessage,
  type OutboundMessage
} from './protocol.js'
import { SessionReconciler } from './reconciler.js'
import { createSessionId, type SessionManager } from './session.js'

export type SessionState = 'open' | 'streaming' | 'finalizing' | 'closed'

/**
 * The connection as seen by a session
 */
export interface SessionTransport {
  send(message: OutboundMessage): void
  close(): void
}

export interface StreamSessionOptions {
  /** Process-wide engine handle; null until the model is initialized */
  engine: TranscriptionEngine | null
  decoder: AudioDecoder
  sessions: SessionManager
  /** Fragments must be strictly larger than this to get a partial pass (default: 1000) */
  minChunkBytes?: number
  /** Status text sent when the final pass starts */
  processingText?: string
  logger?: Logger
  sessionId?: string
}

/**
 * Stream Session
 * Per-connection state machine: open -> streaming -> finalizing -> closed
 */
export class StreamSession {
  readonly sessionId: string
  private state: SessionState = 'open'
  private disconnected = false
  private queue: Promise<void> = Promise.resolve()
  private chunkProcessor: ChunkProcessor | null = null
  private reconciler: SessionReconciler | null = null
  private readonly logger: Logger

  constructor(
    private readonly transport: SessionTransport,
    private readonly options: StreamSessionOptions
  ) {
    this.sessionId = options.sessionId ?? createSessionId()
    this.logger = options.logger ?? silentLogger
  }

  /**
   * Current state
   */
  getState(): SessionState {
    return this.state
  }

  /**
   * Accept the connection. Returns false (and closes) when no engine is available.
   */
  open(): boolean {
    if (this.state !== 'open') {
      return this.state === 'streaming'
    }

    const { engine, decoder, sessions } = this.options

    if (!engine) {
      const error = new EngineNotReadyError()
      this.logger.warn('Rejecting session, engine not ready', { sessionId: this.sessionId })
      this.send(errorMessage(error.message))
      this.close()
      return false
    }

    this.chunkProcessor = new ChunkProcessor(decoder, engine, {
      minChunkBytes: this.options.minChunkBytes,
      logger: this.logger
    })
    this.reconciler = new SessionReconciler(decoder, engine, this.logger)

    sessions.createSession(this.sessionId)
    this.state = 'streaming'
    return true
  }

  /**
   * Queue one inbound frame. Frames are handled strictly one at a time.
   * A Buffer is a binary frame, which the protocol does not use.
   * @returns Promise settled once this frame (and all before it) is handled
   */
  receive(frame: string | Buffer): Promise<void> {
    this.queue = this.queue
      .then(() => this.dispatch(frame))
      .catch((error: unknown) => {
        this.logger.error('Unhandled error while dispatching frame', { sessionId: this.sessionId, error: describeError(error) })
        this.send(errorMessage(describeError(error)))
      })
    return this.queue
  }

  /**
   * Abrupt transport disconnect: discard the session without finalizing
   */
  disconnect(): void {
    if (this.disconnected) {
      return
    }

    this.disconnected = true
    if (this.state !== 'closed') {
      this.logger.info('Client disconnected', { sessionId: this.sessionId, state: this.state })
      this.state = 'closed'
      this.options.sessions.endSession(this.sessionId)
    }
  }

  private async dispatch(frame: string | Buffer): Promise<void> {
    if (this.state !== 'streaming') {
      this.logger.debug('Ignoring frame', { sessionId: this.sessionId, state: this.state })
      return
    }

    try {
      if (typeof frame !== 'string') {
        throw new ProtocolError('Binary frames are not supported; send JSON text frames')
      }

      const message = parseInboundMessage(frame)

      if (message.type === 'audio_chunk') {
        this.handleAudioChunk(message)
      } else {
        await this.finalize()
      }
    } catch (error) {
      if (error instanceof ProtocolError || error instanceof SessionLimitError) {
        this.logger.warn('Rejected message', { sessionId: this.sessionId, error: error.message })
        this.send(errorMessage(error.message))
        return
      }
      throw error
    }
  }

  private handleAudioChunk(message: AudioChunkMessage): void {
    const { sessions } = this.options
    const fragment = sessions.addFragment(this.sessionId, {
      data: Buffer.from(message.data, 'base64'),
      format: message.format.toLowerCase(),
      sampleRate: message.sample_rate
    })

    if (this.chunkProcessor?.shouldProcess(fragment)) {
      const task = this.chunkProcessor.process(fragment, (result) => this.emitPartial(result))
      sessions.trackTask(this.sessionId, task)
    }

    this.send(receivedMessage(fragment.sequence))
  }

  private async finalize(): Promise<void> {
    const { sessions } = this.options
    this.state = 'finalizing'

    const settled = await sessions.settleTasks(this.sessionId)
    if (this.disconnected) {
      return
    }

    const fragments = sessions.seal(this.sessionId)
    this.logger.info('Finalizing session', {
      sessionId: this.sessionId,
      fragments: fragments.length,
      partialTasks: settled.length
    })

    if (fragments.length === 0) {
      this.send(errorMessage(new EmptyAudioError().message))
      this.close()
      return
    }

    this.send(processingMessage(this.options.processingText ?? 'Processing final audio...'))

    try {
      if (!this.reconciler) {
        throw new EngineNotReadyError()
      }
      const result = await this.reconciler.reconcile(fragments)
      this.send(transcriptionMessage(result))
    } catch (error) {
      this.logger.error('Error processing final audio', { sessionId: this.sessionId, error: describeError(error) })
      this.send(errorMessage(`Audio processing failed: ${describeError(error)}`))
    }

    this.close()
  }

  private emitPartial(result: PartialTranscription): void {
    if (this.state === 'streaming' || this.state === 'finalizing') {
      this.send(transcriptionMessage(result))
    } else {
      this.logger.debug('Dropping late partial result', { sessionId: this.sessionId, chunk: result.chunk })
    }
  }

  private send(message: OutboundMessage): void {
    if (!this.disconnected) {
      this.transport.send(message)
    }
  }

  private close(): void {
    this.state = 'closed'
    this.options.sessions.endSession(this.sessionId)
    if (!this.disconnected) {
      this.transport.close()
    }
  }
}
