import { z } from 'zod'
import type { TranscriptionResult } from '../types/index.js'
import { ProtocolError } from './errors.js'

const base64Pattern = /^[A-Za-z0-9+/_-]*={0,2}$/

export const audioChunkMessageSchema = z.object({
  type: z.literal('audio_chunk'),
  data: z.string().regex(base64Pattern, 'data must be base64'),
  format: z.string().trim().min(1).default('webm'),
  sample_rate: z.number().int().positive().default(48000)
})

export const endMessageSchema = z.object({
  type: z.literal('end')
})

export type AudioChunkMessage = z.infer<typeof audioChunkMessageSchema>
export type EndMessage = z.infer<typeof endMessageSchema>
export type InboundMessage = AudioChunkMessage | EndMessage

/**
 * Messages sent back to the client
 */
export type OutboundMessage =
  | { status: 'received'; chunk: number }
  | { status: 'transcription'; text: string; is_final: boolean; chunk?: number }
  | { status: 'processing'; message: string }
  | { status: 'error'; error: string }

const formatIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.') || 'message'}: ${issue.message}`).join('; ')

/**
 * Parse and validate one inbound text frame
 * @throws ProtocolError for malformed JSON, unknown types or invalid fields
 */
export function parseInboundMessage(raw: string): InboundMessage {
  let payload: unknown
  try {
    payload = JSON.parse(raw)
  } catch (error) {
    throw new ProtocolError(`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`)
  }

  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    throw new ProtocolError('Message must be a JSON object')
  }

  const type = 'type' in payload ? payload.type : undefined

  if (type === 'audio_chunk') {
    const parsed = audioChunkMessageSchema.safeParse(payload)
    if (!parsed.success) {
      throw new ProtocolError(`Invalid audio_chunk message: ${formatIssues(parsed.error)}`)
    }
    return parsed.data
  }

  if (type === 'end') {
    return endMessageSchema.parse(payload)
  }

  throw new ProtocolError(`Unknown message type: ${typeof type === 'string' ? type : JSON.stringify(type ?? null)}`)
}

export const receivedMessage = (chunk: number): OutboundMessage => ({ status: 'received', chunk })

export const processingMessage = (message: string): OutboundMessage => ({ status: 'processing', message })

export const errorMessage = (error: string): OutboundMessage => ({ status: 'error', error })

/**
 * Wire form of a transcription result; `chunk` is omitted for the final result
 */
export function transcriptionMessage(result: TranscriptionResult): OutboundMessage {
  if (result.isFinal) {
    return { status: 'transcription', text: result.text, is_final: true }
  }
  return { status: 'transcription', text: result.text, is_final: false, chunk: result.chunk }
}
