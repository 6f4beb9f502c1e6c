import express, { type NextFunction, type Request, type Response } from 'express'
import { z } from 'zod'
import type { TranscriptionEngine } from '../plugins/index.js'
import type { AudioDecoder } from './decoder.js'
import { EngineNotReadyError, describeError } from './errors.js'
import { silentLogger, type Logger } from './logger.js'

export const transcribeRequestSchema = z.object({
  audio_data: z.string().regex(/^[A-Za-z0-9+/_-]*={0,2}$/, 'audio_data must be base64'),
  sample_rate: z.number().int().positive().default(48000),
  format: z.string().trim().min(1).default('wav')
})

export type TranscribeRequest = z.infer<typeof transcribeRequestSchema>

export interface TranscribeResponse {
  text: string
  status: 'success' | 'error'
  error?: string
}

export interface HttpAppOptions {
  /** Returns the engine handle, or null before it is attached */
  getEngine: () => TranscriptionEngine | null
  decoder: AudioDecoder
  /** Number of live streaming sessions, reported by /health */
  getSessionCount: () => number
  /** Body size limit passed to express.json (default: '25mb') */
  bodyLimit?: string
  logger?: Logger
}

const failure = (error: string): TranscribeResponse => ({ text: '', status: 'error', error })

/**
 * One-shot HTTP surface: whole-file transcription and a health probe
 */
export function createHttpApp(options: HttpAppOptions): express.Express {
  const logger = options.logger ?? silentLogger
  const app = express()

  app.use(express.json({ limit: options.bodyLimit ?? '25mb' }))

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      engine: options.getEngine()?.name ?? null,
      sessions: options.getSessionCount(),
      ts: new Date().toISOString()
    })
  })

  app.post('/api/transcribe', async (req: Request, res: Response) => {
    const engine = options.getEngine()
    if (!engine) {
      res.status(503).json(failure(new EngineNotReadyError().message))
      return
    }

    const parsed = transcribeRequestSchema.safeParse(req.body)
    if (!parsed.success) {
      const detail = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ')
      res.status(400).json(failure(detail))
      return
    }

    const { audio_data, format, sample_rate } = parsed.data
    const startedAt = Date.now()

    try {
      const audio = Buffer.from(audio_data, 'base64')
      const pcm = await options.decoder.decode(audio, format.toLowerCase())
      const text = (await engine.transcribe(pcm)).trim()

      logger.info('HTTP transcription complete', {
        bytes: audio.length,
        format,
        declaredSampleRate: sample_rate,
        durationMs: Date.now() - startedAt
      })

      const body: TranscribeResponse = { text, status: 'success' }
      res.json(body)
    } catch (error) {
      logger.error('HTTP transcription failed', { error: describeError(error) })
      res.json(failure(describeError(error)))
    }
  })

  // Malformed JSON and oversized bodies from express.json
  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error)
      return
    }
    const status = error instanceof Error && 'status' in error && typeof error.status === 'number' ? error.status : 500
    logger.warn('Rejected HTTP request', { status, error: describeError(error) })
    res.status(status).json(failure(describeError(error)))
  })

  return app
}
