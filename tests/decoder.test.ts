import { describe, it, expect, vi } from 'vitest'
import { createWavPassthroughStrategy, type StrategyResult } from '../src/core/decode-strategies.js'
import { DecoderAdapter } from '../src/core/decoder.js'
import { DecodeError } from '../src/core/errors.js'
import { int16ToBuffer, samplesToWav, wrapPcmToWav } from '../src/core/pcm.js'
import { countZeroCrossings, tone } from './helpers.js'

const resolvesTo = (result: StrategyResult) => async (): Promise<StrategyResult> => result

const strategy = (name: string, result: StrategyResult | (() => Promise<StrategyResult>)) => {
  const decode = vi.fn(typeof result === 'function' ? result : resolvesTo(result))
  return { name, decode }
}

const monoAudio = (length: number, sampleRate: number): StrategyResult => ({
  ok: true,
  audio: { pcm: new Int16Array(length).fill(500), sampleRate, channels: 1 }
})

const catchDecodeError = async (promise: Promise<unknown>): Promise<DecodeError> => {
  try {
    await promise
  } catch (error) {
    if (error instanceof DecodeError) {
      return error
    }
    throw error
  }
  throw new Error('expected a DecodeError')
}

describe('DecoderAdapter', () => {
  it('rejects tiny inputs without trying any strategy', async () => {
    const first = strategy('first', monoAudio(100, 48000))
    const decoder = new DecoderAdapter({ strategies: [first] })

    const error = await catchDecodeError(decoder.decode(Buffer.alloc(99), 'webm'))

    expect(error.kind).toBe('too_small')
    expect(error.code).toBe('decode_too_small')
    expect(first.decode).not.toHaveBeenCalled()
  })

  it('stops at the first successful strategy and normalizes to 48 kHz', async () => {
    const failing = strategy('failing', { ok: false, reason: 'cannot probe' })
    const working = strategy('working', monoAudio(1600, 16000))
    const unused = strategy('unused', monoAudio(10, 48000))
    const decoder = new DecoderAdapter({ strategies: [failing, working, unused] })

    const pcm = await decoder.decode(Buffer.alloc(200), 'webm')

    expect(pcm.sampleRate).toBe(48000)
    expect(pcm.samples.length).toBe(4800)
    expect(failing.decode).toHaveBeenCalledTimes(1)
    expect(working.decode).toHaveBeenCalledTimes(1)
    expect(unused.decode).not.toHaveBeenCalled()
  })

  it('passes the declared format to strategies in lower case', async () => {
    const working = strategy('working', monoAudio(480, 48000))
    const decoder = new DecoderAdapter({ strategies: [working] })
    const data = Buffer.alloc(200)

    await decoder.decode(data, ' WebM ')

    expect(working.decode).toHaveBeenCalledWith({ data, format: 'webm' })
  })

  it('downmixes multi-channel output', async () => {
    const stereo = strategy('stereo', {
      ok: true,
      audio: { pcm: Int16Array.from([100, 300, -100, -300]), sampleRate: 48000, channels: 2 }
    })
    const decoder = new DecoderAdapter({ strategies: [stereo] })

    const pcm = await decoder.decode(Buffer.alloc(200), 'wav')

    expect(Array.from(pcm.samples)).toEqual([200, -200])
  })

  it('reports the last failure once every strategy has failed', async () => {
    const first = strategy('first', { ok: false, reason: 'no demuxer' })
    const second = strategy('second', async () => {
      throw new Error('spawn ffmpeg ENOENT')
    })
    const decoder = new DecoderAdapter({ strategies: [first, second] })

    const error = await catchDecodeError(decoder.decode(Buffer.alloc(200), 'webm'))

    expect(error.kind).toBe('all_strategies_failed')
    expect(error.message).toBe('All conversion methods failed. Last error (second: spawn ffmpeg ENOENT)')
    expect(error.attempts).toEqual([
      { strategy: 'first', reason: 'no demuxer' },
      { strategy: 'second', reason: 'spawn ffmpeg ENOENT' }
    ])
  })

  it('treats a decode with no samples as empty output', async () => {
    const empty = strategy('empty', monoAudio(0, 48000))
    const decoder = new DecoderAdapter({ strategies: [empty] })

    const error = await catchDecodeError(decoder.decode(Buffer.alloc(200), 'webm'))

    expect(error.kind).toBe('empty_output')
  })

  it('surfaces a resample that would produce nothing', async () => {
    const single = strategy('single', monoAudio(1, 8000000))
    const decoder = new DecoderAdapter({ strategies: [single] })

    const error = await catchDecodeError(decoder.decode(Buffer.alloc(200), 'webm'))

    expect(error.kind).toBe('resample_invalid')
  })

  it('decodes a real WAV file through the passthrough strategy', async () => {
    const input = tone(440, 16000, 1600)
    const decoder = new DecoderAdapter({ strategies: [createWavPassthroughStrategy()] })

    const pcm = await decoder.decode(samplesToWav(input, 16000), 'wav')

    expect(pcm.samples.length).toBe(4800)
    // Same 0.1 s of a 440 Hz tone: about 88 sign changes at either rate
    expect(Math.abs(countZeroCrossings(pcm.samples) - countZeroCrossings(input))).toBeLessThanOrEqual(4)
  })

  it('downmixes and resamples a stereo 22.05 kHz WAV file', async () => {
    const channel = tone(440, 22050, 2205)
    const interleaved = new Int16Array(channel.length * 2)
    channel.forEach((sample, i) => {
      interleaved[2 * i] = sample
      interleaved[2 * i + 1] = sample
    })
    const wav = wrapPcmToWav(int16ToBuffer(interleaved), { sampleRate: 22050, channels: 2, bitsPerSample: 16 })
    const decoder = new DecoderAdapter({ strategies: [createWavPassthroughStrategy()] })

    const pcm = await decoder.decode(wav, 'wav')

    expect(pcm.sampleRate).toBe(48000)
    expect(pcm.samples.length).toBe(4800)
    expect(Math.abs(countZeroCrossings(pcm.samples) - countZeroCrossings(channel))).toBeLessThanOrEqual(4)
  })

  it('lists the default strategy chain in order', () => {
    expect(new DecoderAdapter().getStrategyNames()).toEqual(['media-library', 'ffmpeg-cli', 'wav-passthrough'])
  })
})
