import type { AudioFragment, TranscriptionSession } from '../types/index.js'
import { SessionLimitError, describeError, type SessionLimitReason } from './errors.js'
import { silentLogger, type Logger } from './logger.js'

/**
 * Session constraints configuration
 */
export interface SessionConfig {
  /** Maximum session size in bytes (default: 50MB) */
  maxBytes?: number
  /** Maximum number of audio chunks (default: 2000) */
  maxChunks?: number
}

/**
 * Session event callbacks
 */
export interface SessionCallbacks {
  /** Called when a session is created */
  onCreate?: (session: TranscriptionSession) => void
  /** Called when a session is ended */
  onEnd?: (session: TranscriptionSession) => void
  /** Called when a session exceeds limits */
  onLimitExceeded?: (session: TranscriptionSession, reason: SessionLimitReason) => void
}

/**
 * Fields of a fragment supplied by the transport
 */
export interface FragmentInput {
  data: Buffer
  format: string
  sampleRate: number
}

/**
 * Generate a session identifier
 */
export function createSessionId(): string {
  return `session_${Date.now()}_${Math.random().toString(36).slice(2, 10)}`
}

/**
 * Session Manager
 * Owns per-connection fragment buffers and the set of outstanding chunk tasks
 */
export class SessionManager {
  private sessions: Map<string, TranscriptionSession> = new Map()
  private config: Required<SessionConfig>
  private callbacks: SessionCallbacks
  private logger: Logger

  constructor(config: SessionConfig = {}, callbacks: SessionCallbacks = {}, logger: Logger = silentLogger) {
    this.config = {
      maxBytes: 50 * 1024 * 1024,  // 50MB
      maxChunks: 2000,
      ...config
    }
    this.callbacks = callbacks
    this.logger = logger
  }

  /**
   * Create a new streaming session
   */
  createSession(sessionId: string = createSessionId()): TranscriptionSession {
    const session: TranscriptionSession = {
      sessionId,
      fragments: [],
      fragmentCount: 0,
      pending: new Set(),
      startTime: Date.now(),
      totalBytes: 0,
      terminal: false
    }

    this.sessions.set(sessionId, session)
    this.callbacks.onCreate?.(session)

    this.logger.debug('Session created', { sessionId })
    return session
  }

  /**
   * Get a session by ID
   */
  getSession(sessionId: string): TranscriptionSession | undefined {
    return this.sessions.get(sessionId)
  }

  /**
   * Check if session exists
   */
  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId)
  }

  /**
   * Append a fragment and assign it the next sequence number
   * @throws SessionLimitError when a limit would be exceeded
   * @throws Error when the session is unknown or terminal
   */
  addFragment(sessionId: string, input: FragmentInput): AudioFragment {
    const session = this.requireOpenSession(sessionId)

    const newTotalBytes = session.totalBytes + input.data.length
    if (newTotalBytes > this.config.maxBytes) {
      this.logger.warn('Session exceeded max bytes', { sessionId, bytes: newTotalBytes, maxBytes: this.config.maxBytes })
      return this.limitExceeded(session, 'max_bytes')
    }

    if (session.fragments.length >= this.config.maxChunks) {
      this.logger.warn('Session exceeded max chunks', { sessionId, maxChunks: this.config.maxChunks })
      return this.limitExceeded(session, 'max_chunks')
    }

    const fragment: AudioFragment = Object.freeze({
      sequence: session.fragmentCount + 1,
      data: input.data,
      format: input.format,
      sampleRate: input.sampleRate
    })

    session.fragments.push(fragment)
    session.fragmentCount = fragment.sequence
    session.totalBytes = newTotalBytes

    return fragment
  }

  /**
   * Register a unit of chunk work; it removes itself once settled.
   * A rejected unit is logged here and counts as settled.
   */
  trackTask(sessionId: string, task: Promise<void>): void {
    const session = this.requireOpenSession(sessionId)
    const tracked: Promise<void> = task
      .catch((error: unknown) => {
        this.logger.warn('Chunk task rejected', { sessionId, error: describeError(error) })
      })
      .finally(() => {
        session.pending.delete(tracked)
      })
    session.pending.add(tracked)
  }

  /**
   * Wait until every registered unit has settled. Outcomes are collected, not rethrown.
   */
  async settleTasks(sessionId: string): Promise<PromiseSettledResult<void>[]> {
    const session = this.sessions.get(sessionId)
    if (!session) {
      return []
    }

    const results: PromiseSettledResult<void>[] = []
    // Loop in case a unit was registered while we were waiting
    while (session.pending.size > 0) {
      results.push(...await Promise.allSettled([...session.pending]))
    }
    return results
  }

  /**
   * Stop accepting fragments; returns them in sequence order
   */
  seal(sessionId: string): AudioFragment[] {
    const session = this.sessions.get(sessionId)
    if (!session) {
      return []
    }

    session.terminal = true
    return [...session.fragments].sort((a, b) => a.sequence - b.sequence)
  }

  /**
   * Get session statistics
   */
  getStats(sessionId: string): {
    duration: number
    totalBytes: number
    chunkCount: number
    pendingTasks: number
  } | null {
    const session = this.sessions.get(sessionId)
    if (!session) {
      return null
    }

    return {
      duration: Date.now() - session.startTime,
      totalBytes: session.totalBytes,
      chunkCount: session.fragments.length,
      pendingTasks: session.pending.size
    }
  }

  /**
   * End a session and remove it
   */
  endSession(sessionId: string): TranscriptionSession | null {
    const session = this.sessions.get(sessionId)
    if (!session) {
      return null
    }

    session.terminal = true
    this.sessions.delete(sessionId)
    this.callbacks.onEnd?.(session)

    this.logger.debug('Session ended', { sessionId })
    return session
  }

  /**
   * Get all active session IDs
   */
  getActiveSessions(): string[] {
    return Array.from(this.sessions.keys())
  }

  /**
   * Get number of active sessions
   */
  getSessionCount(): number {
    return this.sessions.size
  }

  /**
   * Clear all sessions
   */
  clearAll(): void {
    for (const sessionId of Array.from(this.sessions.keys())) {
      this.endSession(sessionId)
    }
  }

  private requireOpenSession(sessionId: string): TranscriptionSession {
    const session = this.sessions.get(sessionId)
    if (!session) {
      throw new Error(`Session not found: ${sessionId}`)
    }
    if (session.terminal) {
      throw new Error(`Session is no longer accepting audio: ${sessionId}`)
    }
    return session
  }

  private limitExceeded(session: TranscriptionSession, reason: SessionLimitReason): never {
    this.callbacks.onLimitExceeded?.(session, reason)
    throw new SessionLimitError(reason)
  }
}
