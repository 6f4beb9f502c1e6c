import { CANONICAL_SAMPLE_RATE, type CanonicalPcm } from '../types/index.js'
import { downmixToMono, resampleInt16MonoAsync } from './audio-conversion.js'
import {
  createDefaultStrategies,
  type DecodeStrategy,
  type FfmpegStrategyConfig,
  type StrategyResult
} from './decode-strategies.js'
import { DecodeError, describeError, type DecodeAttempt } from './errors.js'
import { silentLogger, type Logger } from './logger.js'

/**
 * Anything that can turn compressed audio bytes into canonical PCM
 */
export interface AudioDecoder {
  decode(data: Buffer, declaredFormat: string): Promise<CanonicalPcm>
}

/**
 * Decoder configuration
 */
export interface DecoderConfig extends FfmpegStrategyConfig {
  /** Inputs shorter than this are rejected without trying any strategy (default: 100) */
  minBytes?: number
  /** Strategies tried in order (default: media library, ffmpeg CLI, WAV passthrough) */
  strategies?: DecodeStrategy[]
}

/**
 * Decoder Adapter
 * Runs an ordered fallback chain of strategies and normalizes the winner to canonical PCM
 */
export class DecoderAdapter implements AudioDecoder {
  private readonly minBytes: number
  private readonly strategies: DecodeStrategy[]
  private readonly logger: Logger

  constructor(config: DecoderConfig = {}) {
    this.minBytes = config.minBytes ?? 100
    this.strategies = config.strategies ?? createDefaultStrategies(config)
    this.logger = config.logger ?? silentLogger
  }

  /**
   * Names of the configured strategies, in the order they are tried
   */
  getStrategyNames(): string[] {
    return this.strategies.map((strategy) => strategy.name)
  }

  /**
   * Decode bytes of the declared container format
   * @throws DecodeError
   */
  async decode(data: Buffer, declaredFormat: string): Promise<CanonicalPcm> {
    if (data.length < this.minBytes) {
      throw new DecodeError('too_small', `Audio data too small (${data.length} bytes), likely incomplete`)
    }

    const format = declaredFormat.trim().toLowerCase()
    const attempts: DecodeAttempt[] = []

    for (const strategy of this.strategies) {
      let result: StrategyResult
      try {
        result = await strategy.decode({ data, format })
      } catch (error) {
        result = { ok: false, reason: describeError(error) }
      }

      if (!result.ok) {
        attempts.push({ strategy: strategy.name, reason: result.reason })
        this.logger.debug('Decode strategy failed', { strategy: strategy.name, reason: result.reason })
        continue
      }

      const { audio } = result
      if (audio.pcm.length === 0) {
        throw new DecodeError('empty_output', `Decoder '${strategy.name}' produced no audio`, attempts)
      }

      const mono = downmixToMono(audio.pcm, audio.channels)
      const samples = await resampleInt16MonoAsync(mono, audio.sampleRate, CANONICAL_SAMPLE_RATE)

      if (samples.length === 0) {
        throw new DecodeError('empty_output', `Decoder '${strategy.name}' produced no audio`, attempts)
      }

      this.logger.debug('Decoded audio', {
        strategy: strategy.name,
        inputBytes: data.length,
        sourceRate: audio.sampleRate,
        channels: audio.channels,
        samples: samples.length
      })

      return { samples, sampleRate: CANONICAL_SAMPLE_RATE }
    }

    const last = attempts[attempts.length - 1]
    const detail = last ? `${last.strategy}: ${last.reason}` : 'no decode strategies configured'
    throw new DecodeError('all_strategies_failed', `All conversion methods failed. Last error (${detail})`, attempts)
  }
}
