/**
 * Server configuration resolved from TRANSCRIBE_* environment variables
 */
export interface ServerConfig {
  port: number
  host: string
  wsPath: string
  pingIntervalMs: number
  maxPayloadBytes: number
  verbose: boolean
  /** ffmpeg binary used by the decoder */
  ffmpegPath: string
  decodeTimeoutMs: number
  /** Smallest input the decoder attempts */
  minDecodeBytes: number
  /** Fragments must be strictly larger than this to get a partial pass */
  minChunkBytes: number
  maxSessionBytes: number
  maxChunks: number
  whisperBinary: string
  /** ggml model file; empty means no engine is attached */
  whisperModel: string
  whisperLanguage: string
  whisperThreads: number
  whisperTimeoutMs: number
}

type Env = Record<string, string | undefined>

const parseIntOrDefault = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback
  }

  const parsed = Number.parseInt(value, 10)
  return Number.isNaN(parsed) ? fallback : parsed
}

const parseBoolOrDefault = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined) {
    return fallback
  }

  return value.toLowerCase() === 'true' || value === '1'
}

const stringOrDefault = (value: string | undefined, fallback: string): string => {
  const trimmed = value?.trim()
  return trimmed ? trimmed : fallback
}

export const resolveConfig = (env: Env = process.env): ServerConfig => ({
  port: parseIntOrDefault(env.TRANSCRIBE_PORT ?? env.PORT, 8001),
  host: stringOrDefault(env.TRANSCRIBE_HOST, '0.0.0.0'),
  wsPath: stringOrDefault(env.TRANSCRIBE_WS_PATH, '/ws/transcribe'),
  pingIntervalMs: parseIntOrDefault(env.TRANSCRIBE_PING_INTERVAL_MS, 15000),
  maxPayloadBytes: parseIntOrDefault(env.TRANSCRIBE_MAX_PAYLOAD_BYTES, 10 * 1024 * 1024),
  verbose: parseBoolOrDefault(env.TRANSCRIBE_VERBOSE, false),
  ffmpegPath: stringOrDefault(env.TRANSCRIBE_FFMPEG_PATH, 'ffmpeg'),
  decodeTimeoutMs: parseIntOrDefault(env.TRANSCRIBE_DECODE_TIMEOUT_MS, 15000),
  minDecodeBytes: parseIntOrDefault(env.TRANSCRIBE_MIN_DECODE_BYTES, 100),
  minChunkBytes: parseIntOrDefault(env.TRANSCRIBE_MIN_CHUNK_BYTES, 1000),
  maxSessionBytes: parseIntOrDefault(env.TRANSCRIBE_MAX_SESSION_BYTES, 50 * 1024 * 1024),
  maxChunks: parseIntOrDefault(env.TRANSCRIBE_MAX_CHUNKS, 2000),
  whisperBinary: stringOrDefault(env.TRANSCRIBE_WHISPER_BIN, 'whisper-cli'),
  whisperModel: env.TRANSCRIBE_WHISPER_MODEL?.trim() ?? '',
  whisperLanguage: stringOrDefault(env.TRANSCRIBE_WHISPER_LANGUAGE, 'en'),
  whisperThreads: parseIntOrDefault(env.TRANSCRIBE_WHISPER_THREADS, 4),
  whisperTimeoutMs: parseIntOrDefault(env.TRANSCRIBE_WHISPER_TIMEOUT_MS, 240000)
})

/**
 * Human-readable problems with a resolved config; empty when valid
 */
export const validateConfig = (config: ServerConfig): string[] => {
  const errors: string[] = []

  if (config.port < 0 || config.port > 65535) {
    errors.push('TRANSCRIBE_PORT must be between 0 and 65535.')
  }

  if (!config.wsPath.startsWith('/')) {
    errors.push('TRANSCRIBE_WS_PATH must start with "/".')
  }

  if (config.pingIntervalMs < 1000) {
    errors.push('TRANSCRIBE_PING_INTERVAL_MS must be at least 1000.')
  }

  if (config.maxPayloadBytes <= 0) {
    errors.push('TRANSCRIBE_MAX_PAYLOAD_BYTES must be positive.')
  }

  if (config.decodeTimeoutMs <= 0) {
    errors.push('TRANSCRIBE_DECODE_TIMEOUT_MS must be positive.')
  }

  if (config.minDecodeBytes < 0) {
    errors.push('TRANSCRIBE_MIN_DECODE_BYTES must not be negative.')
  }

  if (config.minChunkBytes < 0) {
    errors.push('TRANSCRIBE_MIN_CHUNK_BYTES must not be negative.')
  }

  if (config.maxSessionBytes <= 0) {
    errors.push('TRANSCRIBE_MAX_SESSION_BYTES must be positive.')
  }

  if (config.maxChunks <= 0) {
    errors.push('TRANSCRIBE_MAX_CHUNKS must be positive.')
  }

  if (config.whisperThreads <= 0) {
    errors.push('TRANSCRIBE_WHISPER_THREADS must be positive.')
  }

  if (config.whisperTimeoutMs <= 0) {
    errors.push('TRANSCRIBE_WHISPER_TIMEOUT_MS must be positive.')
  }

  return errors
}
