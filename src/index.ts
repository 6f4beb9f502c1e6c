/**
 * live-transcribe-server: streaming speech-to-text over WebSocket with
 * per-chunk partial results and a whole-session final pass
 *
 * @packageDocumentation
 */

export * from './core/index.js'
export * from './types/index.js'
export * from './plugins/index.js'
export * from './config.js'

import { createServer, type Server as HttpServer } from 'node:http'
import type { AddressInfo } from 'node:net'
import { DecoderAdapter, type AudioDecoder, type DecoderConfig } from './core/decoder.js'
import { createHttpApp } from './core/http.js'
import { createConsoleLogger, type Logger } from './core/logger.js'
import { SessionManager, type SessionConfig } from './core/session.js'
import { StreamSession } from './core/stream-session.js'
import { TranscriptionWebSocketServer, type WebSocketConfig } from './core/websocket.js'
import type { TranscriptionEngine } from './plugins/index.js'

/**
 * Transcription Server configuration
 */
export interface TranscriptionServerConfig {
  /** Port shared by HTTP and WebSocket (default: 8001) */
  port?: number
  /** Host to bind to (default: '0.0.0.0') */
  host?: string
  /** WebSocket transport options */
  websocket?: Omit<WebSocketConfig, 'server' | 'port' | 'host' | 'logger'>
  /** Session limits */
  session?: SessionConfig
  /** Decoder options, or a ready decoder */
  decoder?: DecoderConfig | AudioDecoder
  /** Fragments must be strictly larger than this to get a partial pass (default: 1000) */
  minChunkBytes?: number
  /** Print debug logs (default: false) */
  verbose?: boolean
  logger?: Logger
}

/**
 * High-level Transcription Server
 * Wires the HTTP app, the WebSocket transport and one stream session per connection
 */
export class TranscriptionServer {
  private readonly logger: Logger
  private readonly decoder: AudioDecoder
  private readonly sessionManager: SessionManager
  private readonly wsServer: TranscriptionWebSocketServer
  private readonly httpServer: HttpServer
  private engine: TranscriptionEngine | null = null
  private readonly port: number
  private readonly host: string
  private readonly minChunkBytes: number | undefined

  constructor(config: TranscriptionServerConfig = {}) {
    this.logger = config.logger ?? createConsoleLogger({ verbose: config.verbose })
    this.port = config.port ?? 8001
    this.host = config.host ?? '0.0.0.0'
    this.minChunkBytes = config.minChunkBytes

    const decoder = config.decoder ?? {}
    this.decoder = 'decode' in decoder ? decoder : new DecoderAdapter({ logger: this.logger, ...decoder })

    this.sessionManager = new SessionManager(config.session ?? {}, {
      onEnd: (session) => this.logger.info('Session closed', {
        sessionId: session.sessionId,
        fragments: session.fragments.length,
        bytes: session.totalBytes,
        durationMs: Date.now() - session.startTime
      }),
      onLimitExceeded: (session, reason) => {
        this.logger.warn(`Session ${session.sessionId} limit exceeded: ${reason}`)
      }
    }, this.logger)

    const app = createHttpApp({
      getEngine: () => this.engine,
      decoder: this.decoder,
      getSessionCount: () => this.sessionManager.getSessionCount(),
      logger: this.logger
    })
    this.httpServer = createServer(app)

    this.wsServer = new TranscriptionWebSocketServer(
      { ...config.websocket, server: this.httpServer, logger: this.logger },
      (transport, connectionId) => {
        const session = new StreamSession(transport, {
          engine: this.engine,
          decoder: this.decoder,
          sessions: this.sessionManager,
          minChunkBytes: this.minChunkBytes,
          logger: this.logger
        })
        this.logger.debug('Connection bound to session', { connectionId, sessionId: session.sessionId })
        return session.open() ? session : null
      }
    )
  }

  /**
   * Install the process-wide engine. Sessions opened before this are refused.
   * @throws Error when an engine is already attached
   */
  attachEngine(engine: TranscriptionEngine): void {
    if (this.engine) {
      throw new Error(`Engine already attached: ${this.engine.name}`)
    }
    this.engine = engine
    this.logger.info('Transcription engine attached', { engine: engine.name })
  }

  /**
   * Currently attached engine, if any
   */
  getEngine(): TranscriptionEngine | null {
    return this.engine
  }

  /**
   * Start listening for HTTP and WebSocket traffic
   */
  async start(): Promise<AddressInfo> {
    this.wsServer.start()

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => {
        reject(error)
      }
      this.httpServer.once('error', onError)
      this.httpServer.listen(this.port, this.host, () => {
        this.httpServer.off('error', onError)
        resolve()
      })
    })

    const address = this.getAddress()
    if (!address) {
      throw new Error('HTTP server is not bound to a TCP address')
    }

    this.logger.info(`Transcription server listening on http://${address.address}:${address.port}`)
    return address
  }

  /**
   * Stop the server; live sessions are discarded without finalizing
   */
  async stop(): Promise<void> {
    await this.wsServer.stop()
    this.sessionManager.clearAll()

    if (this.httpServer.listening) {
      await new Promise<void>((resolve, reject) => {
        this.httpServer.close((error) => {
          if (error) {
            reject(error)
            return
          }
          resolve()
        })
      })
    }
    this.logger.info('Transcription server stopped')
  }

  /**
   * Bound address, once listening
   */
  getAddress(): AddressInfo | null {
    const address = this.httpServer.address()
    return address !== null && typeof address === 'object' ? address : null
  }

  /**
   * Get session manager
   */
  getSessionManager(): SessionManager {
    return this.sessionManager
  }
}

/**
 * Default export
 */
export default TranscriptionServer
