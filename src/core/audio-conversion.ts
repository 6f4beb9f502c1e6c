import { setImmediate as yieldToEventLoop } from 'node:timers/promises'
import type { DecodedAudio } from '../types/index.js'
import { DecodeError } from './errors.js'

const WAVE_FORMAT_PCM = 1
const WAVE_FORMAT_IEEE_FLOAT = 3
const WAVE_FORMAT_EXTENSIBLE = 0xfffe

const clampInt16 = (value: number): number => Math.max(-32768, Math.min(32767, Math.round(value)))

/**
 * Decode a RIFF/WAVE buffer to interleaved Int16 samples.
 * Supports PCM (8/16/24/32-bit) and IEEE float32, including WAVE_FORMAT_EXTENSIBLE.
 * A data chunk whose declared size runs past the buffer (streamed WAV) is read to the end.
 * @throws Error describing why the buffer is not a usable WAV file
 */
export function decodeWav(wavBuffer: Buffer): DecodedAudio {
  if (wavBuffer.length < 44) {
    throw new Error(`WAV buffer too small: ${wavBuffer.length} < 44`)
  }

  const riff = wavBuffer.toString('ascii', 0, 4)
  const wave = wavBuffer.toString('ascii', 8, 12)

  if (riff !== 'RIFF' || wave !== 'WAVE') {
    throw new Error(`Invalid WAV headers: RIFF='${riff}', WAVE='${wave}'`)
  }

  let offset = 12
  let fmtFound = false
  let audioFormat = WAVE_FORMAT_PCM
  let channels = 1
  let sampleRate = 16000
  let bitsPerSample = 16
  let data: Buffer | null = null

  // Parse WAV chunks
  while (offset + 8 <= wavBuffer.length) {
    const chunkId = wavBuffer.toString('ascii', offset, offset + 4)
    const chunkSize = wavBuffer.readUInt32LE(offset + 4)
    const chunkDataStart = offset + 8

    if (chunkId === 'fmt ') {
      fmtFound = true
      if (chunkSize >= 16 && chunkDataStart + 16 <= wavBuffer.length) {
        audioFormat = wavBuffer.readUInt16LE(chunkDataStart)
        channels = wavBuffer.readUInt16LE(chunkDataStart + 2)
        sampleRate = wavBuffer.readUInt32LE(chunkDataStart + 4)
        bitsPerSample = wavBuffer.readUInt16LE(chunkDataStart + 14)
        if (audioFormat === WAVE_FORMAT_EXTENSIBLE && chunkSize >= 26 && chunkDataStart + 26 <= wavBuffer.length) {
          audioFormat = wavBuffer.readUInt16LE(chunkDataStart + 24)
        }
      }
    } else if (chunkId === 'data') {
      const end = Math.min(wavBuffer.length, chunkDataStart + chunkSize)
      data = wavBuffer.subarray(chunkDataStart, end)
      break
    }

    // Chunks are word aligned
    offset = chunkDataStart + chunkSize + (chunkSize % 2)
  }

  if (!fmtFound || !data) {
    throw new Error('WAV missing fmt or data chunk')
  }

  if (channels < 1) {
    throw new Error(`Invalid channel count: ${channels}`)
  }

  if (sampleRate <= 0) {
    throw new Error(`Invalid sample rate: ${sampleRate}`)
  }

  let pcm: Int16Array

  if (audioFormat === WAVE_FORMAT_PCM) {
    const bytesPerSample = Math.ceil(bitsPerSample / 8)
    const totalSamples = Math.floor(data.length / (bytesPerSample * channels)) * channels
    pcm = new Int16Array(totalSamples)

    for (let i = 0; i < totalSamples; i++) {
      const base = i * bytesPerSample

      if (bitsPerSample === 16) {
        pcm[i] = data.readInt16LE(base)
      } else if (bitsPerSample === 24) {
        // 24-bit -> keep the top 16 bits
        pcm[i] = data.readIntLE(base, 3) >> 8
      } else if (bitsPerSample === 32) {
        pcm[i] = data.readInt32LE(base) >> 16
      } else if (bitsPerSample === 8) {
        // Unsigned 8-bit PCM -> signed 16-bit
        pcm[i] = (data.readUInt8(base) - 128) << 8
      } else {
        throw new Error(`Unsupported bit depth: ${bitsPerSample}`)
      }
    }
  } else if (audioFormat === WAVE_FORMAT_IEEE_FLOAT && bitsPerSample === 32) {
    const totalSamples = Math.floor(data.length / (4 * channels)) * channels
    pcm = new Int16Array(totalSamples)

    for (let i = 0; i < totalSamples; i++) {
      const f = Math.max(-1, Math.min(1, data.readFloatLE(i * 4)))
      pcm[i] = Math.round(f * 32767)
    }
  } else {
    throw new Error(`Unsupported audio format: ${audioFormat} (${bitsPerSample}-bit)`)
  }

  return { pcm, sampleRate, channels }
}

/**
 * Average interleaved channels into one
 */
export function downmixToMono(pcm: Int16Array, channels: number): Int16Array {
  if (channels <= 1) {
    return pcm
  }

  const frames = Math.floor(pcm.length / channels)
  const out = new Int16Array(frames)

  for (let i = 0; i < frames; i++) {
    let acc = 0
    for (let ch = 0; ch < channels; ch++) {
      acc += pcm[i * channels + ch]!
    }
    out[i] = clampInt16(acc / channels)
  }

  return out
}

export interface ResampleOptions {
  /** Zero crossings of the sinc kernel on each side (default: 16) */
  halfWidth?: number
  /** Output samples computed between yields to the event loop (default: 4096) */
  blockSize?: number
}

// Kernel table entries per unit of input-sample distance
const KERNEL_OVERSAMPLE = 512

const kernelCache = new Map<string, Float64Array>()

/**
 * Windowed-sinc kernel sampled once over [0, width]; taps read it by linear interpolation
 */
function kernelTable(cutoff: number, width: number): Float64Array {
  const key = `${cutoff}:${width}`
  const cached = kernelCache.get(key)
  if (cached) {
    return cached
  }

  const size = width * KERNEL_OVERSAMPLE + 2
  const table = new Float64Array(size)
  for (let k = 0; k < size; k++) {
    const x = k / KERNEL_OVERSAMPLE
    const px = Math.PI * cutoff * x
    const sinc = px === 0 ? 1 : Math.sin(px) / px
    const t = x / width
    const taper = t >= 1 ? 0 : 0.5 * (1 + Math.cos(Math.PI * t))
    table[k] = cutoff * sinc * taper
  }

  kernelCache.set(key, table)
  return table
}

interface ResamplePlan {
  ratio: number
  width: number
  table: Float64Array
  out: Int16Array
}

function planResample(pcm: Int16Array, srcRate: number, dstRate: number, halfWidth: number): ResamplePlan | null {
  if (!(srcRate > 0) || !(dstRate > 0)) {
    throw new DecodeError('resample_invalid', `Invalid resample rates: ${srcRate} -> ${dstRate}`)
  }

  const ratio = dstRate / srcRate
  const outLen = Math.floor(pcm.length * ratio)

  if (outLen <= 0) {
    throw new DecodeError('resample_invalid', `Invalid audio data after resampling (${pcm.length} samples @ ${srcRate}Hz)`)
  }

  if (srcRate === dstRate) {
    return null
  }

  const cutoff = Math.min(1, ratio)
  const width = Math.ceil(halfWidth / cutoff)
  return { ratio, width, table: kernelTable(cutoff, width), out: new Int16Array(outLen) }
}

function resampleRange(pcm: Int16Array, plan: ResamplePlan, from: number, to: number): void {
  const { ratio, width, table, out } = plan
  const limit = width * KERNEL_OVERSAMPLE

  for (let i = from; i < to; i++) {
    const center = i / ratio
    const first = Math.max(0, Math.floor(center) - width + 1)
    const last = Math.min(pcm.length - 1, Math.floor(center) + width)

    let acc = 0
    let weightSum = 0

    for (let j = first; j <= last; j++) {
      const pos = Math.abs(center - j) * KERNEL_OVERSAMPLE
      if (pos >= limit) {
        continue
      }
      const k = Math.floor(pos)
      const frac = pos - k
      const weight = table[k]! + (table[k + 1]! - table[k]!) * frac
      acc += pcm[j]! * weight
      weightSum += weight
    }

    out[i] = weightSum === 0 ? 0 : clampInt16(acc / weightSum)
  }
}

/**
 * Resample Int16 mono PCM with windowed-sinc (band-limited) interpolation.
 * When downsampling, the kernel cutoff drops to the new Nyquist frequency.
 * @throws DecodeError of kind resample_invalid when the output would be empty
 */
export function resampleInt16Mono(
  pcm: Int16Array,
  srcRate: number,
  dstRate: number,
  options: ResampleOptions = {}
): Int16Array {
  const plan = planResample(pcm, srcRate, dstRate, options.halfWidth ?? 16)
  if (!plan) {
    return pcm
  }
  resampleRange(pcm, plan, 0, plan.out.length)
  return plan.out
}

/**
 * Same as {@link resampleInt16Mono}, computed in blocks with a yield to the
 * event loop between them so socket traffic keeps flowing during long buffers
 */
export async function resampleInt16MonoAsync(
  pcm: Int16Array,
  srcRate: number,
  dstRate: number,
  options: ResampleOptions = {}
): Promise<Int16Array> {
  const plan = planResample(pcm, srcRate, dstRate, options.halfWidth ?? 16)
  if (!plan) {
    return pcm
  }

  const blockSize = Math.max(1, options.blockSize ?? 4096)
  for (let from = 0; from < plan.out.length; from += blockSize) {
    if (from > 0) {
      await yieldToEventLoop()
    }
    resampleRange(pcm, plan, from, Math.min(plan.out.length, from + blockSize))
  }
  return plan.out
}
