import { vi, type Mock } from 'vitest'
import type { AudioDecoder } from '../src/core/decoder.js'
import { DecodeError } from '../src/core/errors.js'
import type { Logger } from '../src/core/logger.js'
import type { OutboundMessage } from '../src/core/protocol.js'
import type { SessionTransport } from '../src/core/stream-session.js'
import type { TranscriptionEngine } from '../src/plugins/index.js'
import { CANONICAL_SAMPLE_RATE, type CanonicalPcm } from '../src/types/index.js'

/**
 * Sine tone as 16-bit samples
 */
export function tone(frequency: number, sampleRate: number, length: number, amplitude = 10000): Int16Array {
  const out = new Int16Array(length)
  for (let i = 0; i < length; i++) {
    out[i] = Math.round(amplitude * Math.sin(2 * Math.PI * frequency * i / sampleRate + 0.3))
  }
  return out
}

export function countZeroCrossings(samples: Int16Array): number {
  let crossings = 0
  for (let i = 1; i < samples.length; i++) {
    const previous = samples[i - 1] ?? 0
    const current = samples[i] ?? 0
    if ((previous < 0) !== (current < 0)) {
      crossings++
    }
  }
  return crossings
}

/**
 * Decoder that fails for buffers starting with 0xff and otherwise yields
 * one canonical sample per input byte
 */
export class FakeDecoder implements AudioDecoder {
  readonly calls: Array<{ bytes: number; format: string }> = []

  async decode(data: Buffer, declaredFormat: string): Promise<CanonicalPcm> {
    this.calls.push({ bytes: data.length, format: declaredFormat })
    if (data[0] === 0xff) {
      throw new DecodeError('all_strategies_failed', 'All conversion methods failed. Last error (fake: not a container)')
    }
    return { samples: new Int16Array(data.length), sampleRate: CANONICAL_SAMPLE_RATE }
  }
}

/**
 * Engine reporting how many samples it was given
 */
export class FakeEngine implements TranscriptionEngine {
  readonly name = 'fake'
  readonly calls: number[] = []

  constructor(private readonly render: (samples: number) => string = (samples) => `heard ${samples} samples`) {}

  async transcribe(pcm: CanonicalPcm): Promise<string> {
    this.calls.push(pcm.samples.length)
    return this.render(pcm.samples.length)
  }
}

export class RecordingTransport implements SessionTransport {
  readonly messages: OutboundMessage[] = []
  closed = 0

  send(message: OutboundMessage): void {
    this.messages.push(message)
  }

  close(): void {
    this.closed++
  }
}

export const audioChunk = (data: Buffer, format = 'webm'): string =>
  JSON.stringify({ type: 'audio_chunk', data: data.toString('base64'), format, sample_rate: 48000 })

export const endFrame = JSON.stringify({ type: 'end' })

export const spyLogger = (): { [K in keyof Logger]: Mock } => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn()
})
