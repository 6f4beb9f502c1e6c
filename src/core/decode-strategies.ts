import { execFile } from 'node:child_process'
import { promises as fsPromises } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { PassThrough, Readable } from 'node:stream'
import { promisify } from 'node:util'
import ffmpeg from 'fluent-ffmpeg'
import { CANONICAL_SAMPLE_RATE, type DecodedAudio } from '../types/index.js'
import { decodeWav } from './audio-conversion.js'
import { describeError } from './errors.js'
import { silentLogger, type Logger } from './logger.js'
import { bufferToInt16 } from './pcm.js'

const execFileAsync = promisify(execFile)

/**
 * Input handed to every strategy
 */
export interface DecodeInput {
  data: Buffer
  /** Declared container format, lower case (e.g. "webm") */
  format: string
}

export type StrategyResult =
  | { ok: true; audio: DecodedAudio }
  | { ok: false; reason: string }

/**
 * One way of turning compressed bytes into PCM. Never throws.
 */
export interface DecodeStrategy {
  readonly name: string
  decode(input: DecodeInput): Promise<StrategyResult>
}

/**
 * Configuration shared by the ffmpeg-backed strategies
 */
export interface FfmpegStrategyConfig {
  /** Path to ffmpeg binary (defaults to 'ffmpeg' in PATH) */
  ffmpegPath?: string
  /** Hard timeout for one decode in milliseconds (default: 15000) */
  timeoutMs?: number
  /** Working directory for temporary files (default: OS temp dir) */
  tempDir?: string
  logger?: Logger
}

// Demuxer names for formats ffmpeg cannot always probe from a pipe
const INPUT_FORMATS: Record<string, string> = {
  webm: 'webm',
  ogg: 'ogg',
  opus: 'ogg',
  wav: 'wav',
  mp3: 'mp3',
  flac: 'flac',
  aac: 'aac'
}

const fileExtension = (format: string): string => (/^[a-z0-9]{1,8}$/.test(format) ? format : 'bin')

/**
 * Container-aware decode through fluent-ffmpeg, streaming from memory to memory.
 * Output is s16le mono at the canonical rate.
 */
export function createMediaLibraryStrategy(config: FfmpegStrategyConfig = {}): DecodeStrategy {
  const timeoutMs = config.timeoutMs ?? 15000
  const logger = config.logger ?? silentLogger

  return {
    name: 'media-library',
    decode(input: DecodeInput): Promise<StrategyResult> {
      return new Promise((resolve) => {
        const chunks: Buffer[] = []
        const sink = new PassThrough()
        let settled = false
        let commandEnded = false
        let sinkEnded = false

        const finish = (result: StrategyResult): void => {
          if (!settled) {
            settled = true
            resolve(result)
          }
        }

        const maybeSucceed = (): void => {
          if (commandEnded && sinkEnded) {
            const data = Buffer.concat(chunks)
            finish({ ok: true, audio: { pcm: bufferToInt16(data), sampleRate: CANONICAL_SAMPLE_RATE, channels: 1 } })
          }
        }

        sink.on('data', (chunk: Buffer) => chunks.push(chunk))
        sink.on('end', () => {
          sinkEnded = true
          maybeSucceed()
        })

        try {
          const command = ffmpeg(Readable.from([input.data]), { timeout: Math.max(1, Math.ceil(timeoutMs / 1000)) })

          if (config.ffmpegPath) {
            command.setFfmpegPath(config.ffmpegPath)
          }

          const demuxer = INPUT_FORMATS[input.format]
          if (demuxer) {
            command.inputFormat(demuxer)
          }

          command
            .noVideo()
            .audioChannels(1)
            .audioFrequency(CANONICAL_SAMPLE_RATE)
            .audioCodec('pcm_s16le')
            .format('s16le')
            .on('error', (error: Error) => {
              finish({ ok: false, reason: error.message })
            })
            .on('end', () => {
              commandEnded = true
              maybeSucceed()
            })

          command.pipe(sink, { end: true })
        } catch (error) {
          logger.debug('media-library strategy could not start', { error: describeError(error) })
          finish({ ok: false, reason: describeError(error) })
        }
      })
    }
  }
}

/**
 * Runs the ffmpeg binary on temporary files with a hard timeout.
 * Output is a 16-bit mono WAV at the canonical rate.
 */
export function createFfmpegCliStrategy(config: FfmpegStrategyConfig = {}): DecodeStrategy {
  const ffmpegPath = config.ffmpegPath ?? 'ffmpeg'
  const timeoutMs = config.timeoutMs ?? 15000
  const logger = config.logger ?? silentLogger

  return {
    name: 'ffmpeg-cli',
    async decode(input: DecodeInput): Promise<StrategyResult> {
      let workDir: string | null = null

      try {
        workDir = await fsPromises.mkdtemp(join(config.tempDir ?? tmpdir(), 'decode-'))
        const inputPath = join(workDir, `input.${fileExtension(input.format)}`)
        const outputPath = join(workDir, 'output.wav')

        await fsPromises.writeFile(inputPath, input.data)

        const args = [
          '-hide_banner',
          '-loglevel', 'error',
          '-y',
          '-i', inputPath,
          '-vn',
          '-ar', String(CANONICAL_SAMPLE_RATE),
          '-ac', '1',
          '-c:a', 'pcm_s16le',
          '-f', 'wav',
          outputPath
        ]

        logger.debug('Executing ffmpeg', { ffmpegPath, args: args.join(' ') })

        await execFileAsync(ffmpegPath, args, { timeout: timeoutMs, killSignal: 'SIGKILL' })

        const wav = await fsPromises.readFile(outputPath)
        return { ok: true, audio: decodeWav(wav) }
      } catch (error) {
        if (error instanceof Error && 'killed' in error && error.killed === true) {
          return { ok: false, reason: `ffmpeg timed out after ${timeoutMs}ms` }
        }
        return { ok: false, reason: describeError(error) }
      } finally {
        if (workDir) {
          await fsPromises.rm(workDir, { recursive: true, force: true }).catch((cleanupError: unknown) => {
            logger.warn('Failed to cleanup temp files', { workDir, error: describeError(cleanupError) })
          })
        }
      }
    }
  }
}

/**
 * Reads the bytes directly as an already-valid WAV container
 */
export function createWavPassthroughStrategy(): DecodeStrategy {
  return {
    name: 'wav-passthrough',
    async decode(input: DecodeInput): Promise<StrategyResult> {
      try {
        return { ok: true, audio: decodeWav(input.data) }
      } catch (error) {
        return { ok: false, reason: describeError(error) }
      }
    }
  }
}

/**
 * The default fallback chain: media library, ffmpeg CLI, direct WAV read
 */
export function createDefaultStrategies(config: FfmpegStrategyConfig = {}): DecodeStrategy[] {
  return [
    createMediaLibraryStrategy(config),
    createFfmpegCliStrategy(config),
    createWavPassthroughStrategy()
  ]
}
