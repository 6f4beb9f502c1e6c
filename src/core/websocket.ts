import type { Server as HttpServer } from 'node:http'
import { WebSocketServer, WebSocket, type RawData } from 'ws'
import { describeError } from './errors.js'
import { silentLogger, type Logger } from './logger.js'
import type { OutboundMessage } from './protocol.js'
import type { SessionTransport } from './stream-session.js'

/**
 * WebSocket server configuration
 */
export interface WebSocketConfig {
  /** Port to listen on; ignored when `server` is given */
  port?: number
  /** Host to bind to (default: '0.0.0.0') */
  host?: string
  /** Existing HTTP server to share instead of listening on a port */
  server?: HttpServer
  /** WebSocket path (default: '/ws/transcribe') */
  path?: string
  /** Heartbeat ping interval in ms (default: 15000) */
  pingInterval?: number
  /** Maximum payload size in bytes (default: 10MB) */
  maxPayload?: number
  /** Enable per-message deflate compression (default: false) */
  perMessageDeflate?: boolean
  logger?: Logger
}

/**
 * What the server drives for each connection
 */
export interface ConnectionHandler {
  receive(frame: string | Buffer): Promise<void>
  disconnect(): void
}

/**
 * Builds the handler for a new connection. Returning null means the
 * connection was refused and has already been told why.
 */
export type ConnectionFactory = (transport: SessionTransport, connectionId: string) => ConnectionHandler | null

interface ConnectionInfo {
  connectionId: string
  handler: ConnectionHandler | null
  isAlive: boolean
}

const NORMAL_CLOSURE = 1000

function frameToText(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8')
  }
  return Buffer.isBuffer(data) ? data.toString('utf8') : Buffer.from(data).toString('utf8')
}

function frameToBuffer(data: RawData): Buffer {
  if (Array.isArray(data)) {
    return Buffer.concat(data)
  }
  return Buffer.isBuffer(data) ? data : Buffer.from(data)
}

/**
 * Transcription WebSocket Server
 * Carries JSON text frames between clients and their stream sessions
 */
export class TranscriptionWebSocketServer {
  private wss: WebSocketServer | null = null
  private connections: Map<WebSocket, ConnectionInfo> = new Map()
  private heartbeatTimer: NodeJS.Timeout | null = null
  private config: Required<Omit<WebSocketConfig, 'server' | 'port' | 'logger'>> & Pick<WebSocketConfig, 'server' | 'port'>
  private logger: Logger
  private connectionCounter = 0

  constructor(config: WebSocketConfig, private readonly factory: ConnectionFactory) {
    this.config = {
      host: config.host ?? '0.0.0.0',
      path: config.path ?? '/ws/transcribe',
      pingInterval: config.pingInterval ?? 15000,
      maxPayload: config.maxPayload ?? 10 * 1024 * 1024,
      perMessageDeflate: config.perMessageDeflate ?? false,
      server: config.server,
      port: config.port
    }
    this.logger = config.logger ?? silentLogger
  }

  /**
   * Start accepting connections
   */
  start(): void {
    if (this.wss) {
      this.logger.warn('WebSocket server already running')
      return
    }

    const common = {
      path: this.config.path,
      perMessageDeflate: this.config.perMessageDeflate,
      maxPayload: this.config.maxPayload
    }

    if (this.config.server) {
      this.wss = new WebSocketServer({ ...common, server: this.config.server })
      this.logger.info('WebSocket endpoint attached to HTTP server', { path: this.config.path })
    } else {
      this.wss = new WebSocketServer({ ...common, port: this.config.port ?? 8001, host: this.config.host })
      this.logger.info(`WebSocket server listening on ws://${this.config.host}:${this.config.port ?? 8001}${this.config.path}`)
    }

    this.heartbeatTimer = setInterval(() => {
      this.heartbeat()
    }, this.config.pingInterval)

    this.wss.on('connection', (ws: WebSocket) => {
      this.handleConnection(ws)
    })

    this.wss.on('error', (error) => {
      this.logger.error('WebSocket server error', { error: describeError(error) })
    })
  }

  /**
   * Stop the server and drop every connection without finalizing
   */
  async stop(): Promise<void> {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer)
      this.heartbeatTimer = null
    }

    for (const [ws, info] of this.connections) {
      info.handler?.disconnect()
      ws.terminate()
    }
    this.connections.clear()

    const wss = this.wss
    if (wss) {
      this.wss = null
      await new Promise<void>((resolve, reject) => {
        wss.close((error) => {
          if (error) {
            reject(error)
            return
          }
          this.logger.info('WebSocket server closed')
          resolve()
        })
      })
    }
  }

  /**
   * Number of open connections
   */
  getConnectionCount(): number {
    return this.connections.size
  }

  /**
   * Send a JSON message if the socket is still open
   */
  sendJson(ws: WebSocket, message: OutboundMessage): boolean {
    if (ws.readyState !== WebSocket.OPEN) {
      return false
    }

    try {
      ws.send(JSON.stringify(message))
      return true
    } catch (error) {
      this.logger.error('Error sending message', { error: describeError(error) })
      return false
    }
  }

  /**
   * Heartbeat to detect dead connections
   */
  private heartbeat(): void {
    for (const [ws, info] of this.connections) {
      if (!info.isAlive) {
        this.logger.info('Terminating dead connection', { connectionId: info.connectionId })
        info.handler?.disconnect()
        ws.terminate()
        this.connections.delete(ws)
        continue
      }

      info.isAlive = false
      ws.ping()
    }
  }

  private handleConnection(ws: WebSocket): void {
    this.connectionCounter += 1
    const connectionId = `conn_${this.connectionCounter}`
    const info: ConnectionInfo = { connectionId, handler: null, isAlive: true }
    this.connections.set(ws, info)

    this.logger.info('WebSocket connection established', { connectionId })

    ws.on('pong', () => {
      info.isAlive = true
    })

    ws.on('message', (data: RawData, isBinary: boolean) => {
      const handler = info.handler
      if (!handler) {
        return
      }
      const frame = isBinary ? frameToBuffer(data) : frameToText(data)
      handler.receive(frame).catch((error: unknown) => {
        this.logger.error('Error handling frame', { connectionId, error: describeError(error) })
      })
    })

    ws.on('error', (error) => {
      this.logger.error('WebSocket error', { connectionId, error: describeError(error) })
    })

    ws.on('close', () => {
      this.logger.info('WebSocket connection closed', { connectionId })
      this.connections.delete(ws)
      info.handler?.disconnect()
    })

    const transport: SessionTransport = {
      send: (message) => {
        this.sendJson(ws, message)
      },
      close: () => {
        if (ws.readyState === WebSocket.OPEN) {
          ws.close(NORMAL_CLOSURE, 'Session complete')
        }
      }
    }

    info.handler = this.factory(transport, connectionId)
  }
}
