/**
 * Sample layout of raw little-endian PCM
 */
export interface PcmLayout {
  sampleRate: number
  channels: number
  bitsPerSample: number
}

const WAV_HEADER_BYTES = 44

/**
 * 44-byte canonical RIFF/WAVE header for integer PCM
 * @param dataSize Size of the PCM payload in bytes
 */
export function createWavHeader(dataSize: number, layout: PcmLayout): Buffer {
  const { sampleRate, channels, bitsPerSample } = layout
  const blockAlign = channels * Math.ceil(bitsPerSample / 8)
  const header = Buffer.alloc(WAV_HEADER_BYTES)

  header.write('RIFF', 0, 'ascii')
  header.writeUInt32LE(WAV_HEADER_BYTES - 8 + dataSize, 4)
  header.write('WAVE', 8, 'ascii')

  header.write('fmt ', 12, 'ascii')
  header.writeUInt32LE(16, 16)
  header.writeUInt16LE(1, 20) // integer PCM
  header.writeUInt16LE(channels, 22)
  header.writeUInt32LE(sampleRate, 24)
  header.writeUInt32LE(sampleRate * blockAlign, 28)
  header.writeUInt16LE(blockAlign, 32)
  header.writeUInt16LE(bitsPerSample, 34)

  header.write('data', 36, 'ascii')
  header.writeUInt32LE(dataSize, 40)

  return header
}

/**
 * Prefix raw PCM bytes with a WAV header
 */
export function wrapPcmToWav(pcmData: Buffer, layout: PcmLayout): Buffer {
  return Buffer.concat([createWavHeader(pcmData.length, layout), pcmData])
}

/**
 * Mono 16-bit samples as a complete WAV file
 */
export function samplesToWav(samples: Int16Array, sampleRate: number): Buffer {
  return wrapPcmToWav(int16ToBuffer(samples), { sampleRate, channels: 1, bitsPerSample: 16 })
}

/**
 * View 16-bit samples as little-endian bytes without copying
 */
export function int16ToBuffer(samples: Int16Array): Buffer {
  return Buffer.from(samples.buffer, samples.byteOffset, samples.byteLength)
}

/**
 * Copy little-endian s16 bytes into a sample array. A trailing odd byte is dropped.
 */
export function bufferToInt16(data: Buffer): Int16Array {
  const out = new Int16Array(Math.floor(data.length / 2))
  for (let i = 0; i < out.length; i++) {
    out[i] = data.readInt16LE(i * 2)
  }
  return out
}
