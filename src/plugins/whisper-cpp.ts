import { execFile } from 'node:child_process'
import { constants as fsConstants, promises as fsPromises } from 'node:fs'
import { tmpdir } from 'node:os'
import { delimiter, isAbsolute, join } from 'node:path'
import { promisify } from 'node:util'
import { resampleInt16MonoAsync } from '../core/audio-conversion.js'
import { EngineInitError, describeError } from '../core/errors.js'
import { silentLogger, type Logger } from '../core/logger.js'
import { samplesToWav } from '../core/pcm.js'
import type { CanonicalPcm } from '../types/index.js'
import type { TranscriptionEngine } from './index.js'

const execFileAsync = promisify(execFile)

// whisper.cpp only accepts 16 kHz input
const WHISPER_SAMPLE_RATE = 16000

/**
 * whisper.cpp command-line engine configuration
 */
export interface WhisperCppConfig {
  /** whisper.cpp binary, absolute or on PATH (default: 'whisper-cli') */
  binaryPath?: string
  /** ggml model file */
  modelPath: string
  /** Spoken language code (default: 'en') */
  language?: string
  /** Worker threads passed with -t (default: 4) */
  threads?: number
  /** Timeout for one transcription in milliseconds (default: 240000) */
  timeoutMs?: number
  /** Working directory for temporary files (default: OS temp dir) */
  tempDir?: string
  logger?: Logger
}

/**
 * Keep transcript lines, dropping bracketed timestamp/log lines
 */
export function extractTranscript(stdout: string): string {
  return stdout
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith('['))
    .join(' ')
    .replace(/\s+/g, ' ')
    .trim()
}

const isExecutable = async (filePath: string): Promise<boolean> => {
  try {
    await fsPromises.access(filePath, fsConstants.X_OK)
    return true
  } catch {
    return false
  }
}

const findOnPath = async (command: string): Promise<string | null> => {
  if (isAbsolute(command) || command.includes('/')) {
    return (await isExecutable(command)) ? command : null
  }

  for (const dir of (process.env.PATH ?? '').split(delimiter)) {
    if (dir && await isExecutable(join(dir, command))) {
      return join(dir, command)
    }
  }
  return null
}

/**
 * Transcription engine backed by the whisper.cpp CLI.
 * Each call runs in its own child process, so concurrent calls are safe.
 */
export class WhisperCppEngine implements TranscriptionEngine {
  readonly name = 'whisper.cpp'
  private readonly config: Required<Omit<WhisperCppConfig, 'logger'>>
  private readonly logger: Logger

  private constructor(config: Required<Omit<WhisperCppConfig, 'logger'>>, logger: Logger) {
    this.config = config
    this.logger = logger
  }

  /**
   * Verify the binary and model exist and return a ready engine
   * @throws EngineInitError when an asset is missing
   */
  static async initialize(config: WhisperCppConfig): Promise<WhisperCppEngine> {
    const logger = config.logger ?? silentLogger
    const binary = await findOnPath(config.binaryPath ?? 'whisper-cli')

    if (!binary) {
      throw new EngineInitError(`whisper.cpp binary not found: ${config.binaryPath ?? 'whisper-cli'}`)
    }

    try {
      const stats = await fsPromises.stat(config.modelPath)
      if (!stats.isFile() || stats.size === 0) {
        throw new Error('not a non-empty file')
      }
    } catch (error) {
      throw new EngineInitError(`Whisper model not usable at ${config.modelPath}: ${describeError(error)}`, error)
    }

    logger.info('Transcription engine initialized', { engine: 'whisper.cpp', binary, model: config.modelPath })

    return new WhisperCppEngine({
      binaryPath: binary,
      modelPath: config.modelPath,
      language: config.language ?? 'en',
      threads: config.threads ?? 4,
      timeoutMs: config.timeoutMs ?? 240000,
      tempDir: config.tempDir ?? tmpdir()
    }, logger)
  }

  async transcribe(pcm: CanonicalPcm): Promise<string> {
    const samples = await resampleInt16MonoAsync(pcm.samples, pcm.sampleRate, WHISPER_SAMPLE_RATE)
    const wav = samplesToWav(samples, WHISPER_SAMPLE_RATE)
    const workDir = await fsPromises.mkdtemp(join(this.config.tempDir, 'whisper-'))

    try {
      const wavPath = join(workDir, 'audio.wav')
      await fsPromises.writeFile(wavPath, wav)

      const args = [
        '-m', this.config.modelPath,
        '-f', wavPath,
        '-l', this.config.language,
        '-t', String(this.config.threads),
        '--no-timestamps'
      ]

      const startedAt = Date.now()
      const { stdout } = await execFileAsync(this.config.binaryPath, args, {
        timeout: this.config.timeoutMs,
        maxBuffer: 16 * 1024 * 1024
      })

      const text = extractTranscript(stdout)
      this.logger.debug('whisper.cpp finished', {
        durationMs: Date.now() - startedAt,
        audioSeconds: samples.length / WHISPER_SAMPLE_RATE,
        chars: text.length
      })
      return text
    } finally {
      await fsPromises.rm(workDir, { recursive: true, force: true }).catch((error: unknown) => {
        this.logger.warn('Failed to cleanup temp files', { workDir, error: describeError(error) })
      })
    }
  }
}
