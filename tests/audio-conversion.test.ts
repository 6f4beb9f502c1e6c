import { describe, it, expect } from 'vitest'
import { decodeWav, downmixToMono, resampleInt16Mono, resampleInt16MonoAsync } from '../src/core/audio-conversion.js'
import { DecodeError } from '../src/core/errors.js'
import { createWavHeader, int16ToBuffer, wrapPcmToWav } from '../src/core/pcm.js'
import { countZeroCrossings, tone } from './helpers.js'

describe('decodeWav', () => {
  it('reads 16-bit mono samples and format', () => {
    const samples = Int16Array.from([0, 1000, -1000, 32767, -32768])
    const wav = wrapPcmToWav(int16ToBuffer(samples), { sampleRate: 16000, channels: 1, bitsPerSample: 16 })

    const decoded = decodeWav(wav)

    expect(decoded.sampleRate).toBe(16000)
    expect(decoded.channels).toBe(1)
    expect(Array.from(decoded.pcm)).toEqual([0, 1000, -1000, 32767, -32768])
  })

  it('keeps stereo interleaved', () => {
    const samples = Int16Array.from([100, 300, -100, -300])
    const decoded = decodeWav(wrapPcmToWav(int16ToBuffer(samples), { sampleRate: 44100, channels: 2, bitsPerSample: 16 }))

    expect(decoded.channels).toBe(2)
    expect(Array.from(decoded.pcm)).toEqual([100, 300, -100, -300])
  })

  it('converts unsigned 8-bit samples', () => {
    const decoded = decodeWav(wrapPcmToWav(Buffer.from([128, 255, 0]), { sampleRate: 8000, channels: 1, bitsPerSample: 8 }))

    expect(Array.from(decoded.pcm)).toEqual([0, 32512, -32768])
  })

  it('reads a data chunk whose declared size runs past the buffer', () => {
    const header = createWavHeader(1000, { sampleRate: 16000, channels: 1, bitsPerSample: 16 })
    const body = int16ToBuffer(Int16Array.from([7, -7]))

    const decoded = decodeWav(Buffer.concat([header, body]))

    expect(Array.from(decoded.pcm)).toEqual([7, -7])
  })

  it('rejects buffers shorter than a header', () => {
    expect(() => decodeWav(Buffer.alloc(10))).toThrow('WAV buffer too small: 10 < 44')
  })

  it('rejects buffers without RIFF/WAVE markers', () => {
    const wav = wrapPcmToWav(Buffer.alloc(8), { sampleRate: 16000, channels: 1, bitsPerSample: 16 })
    wav.write('OggS', 0, 'ascii')

    expect(() => decodeWav(wav)).toThrow("Invalid WAV headers: RIFF='OggS', WAVE='WAVE'")
  })
})

describe('downmixToMono', () => {
  it('averages channel pairs', () => {
    expect(Array.from(downmixToMono(Int16Array.from([100, 300, -100, -300]), 2))).toEqual([200, -200])
  })

  it('returns mono input unchanged', () => {
    const pcm = Int16Array.from([1, 2, 3])
    expect(downmixToMono(pcm, 1)).toBe(pcm)
  })
})

describe('resampleInt16Mono', () => {
  it('upsamples a 16 kHz tone to exactly three times as many samples', () => {
    const input = tone(440, 16000, 8000)

    const output = resampleInt16Mono(input, 16000, 48000)

    expect(output.length).toBe(24000)
    // Same duration, same pitch: the number of sign changes matches
    expect(Math.abs(countZeroCrossings(output) - countZeroCrossings(input))).toBeLessThanOrEqual(4)
  })

  it('keeps a constant signal constant when downsampling', () => {
    const input = new Int16Array(4800).fill(1000)

    const output = resampleInt16Mono(input, 48000, 16000)

    expect(output.length).toBe(1600)
    expect(output.every((sample) => sample === 1000)).toBe(true)
  })

  it('returns the input when rates match', () => {
    const input = tone(440, 48000, 480)
    expect(resampleInt16Mono(input, 48000, 48000)).toBe(input)
  })

  it('rejects a result that would be empty', () => {
    expect(() => resampleInt16Mono(new Int16Array(1), 48000, 16000)).toThrow(DecodeError)

    try {
      resampleInt16Mono(new Int16Array(1), 48000, 16000)
    } catch (error) {
      expect(error).toBeInstanceOf(DecodeError)
      expect(error instanceof DecodeError && error.kind).toBe('resample_invalid')
    }
  })

  it('rejects non-positive rates', () => {
    expect(() => resampleInt16Mono(new Int16Array(10), 0, 48000)).toThrow('Invalid resample rates: 0 -> 48000')
  })
})

describe('resampleInt16MonoAsync', () => {
  it('matches the synchronous result', async () => {
    const input = tone(440, 48000, 9600)

    const output = await resampleInt16MonoAsync(input, 48000, 16000, { blockSize: 500 })

    expect(Array.from(output)).toEqual(Array.from(resampleInt16Mono(input, 48000, 16000)))
  })

  it('lets other event loop work run while a long buffer is resampled', async () => {
    const events: string[] = []
    const input = tone(440, 48000, 48000 * 10)

    const pending = resampleInt16MonoAsync(input, 48000, 16000).then((output) => {
      events.push('resampled')
      return output
    })
    setImmediate(() => events.push('tick'))

    const output = await pending

    expect(output.length).toBe(160000)
    expect(events).toEqual(['tick', 'resampled'])
  })

  it('rejects when the output would be empty', async () => {
    await expect(resampleInt16MonoAsync(new Int16Array(1), 48000, 16000)).rejects.toThrow(DecodeError)
  })
})
