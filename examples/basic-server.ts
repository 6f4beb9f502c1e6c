/**
 * Transcription server bootstrap
 *
 * Reads TRANSCRIBE_* settings (from the environment or a .env file), starts
 * HTTP + WebSocket on one port and attaches the whisper.cpp engine once the
 * model is verified. Sessions opened before that are refused with
 * "Model not initialized".
 */

import 'dotenv/config'
import {
  TranscriptionServer,
  WhisperCppEngine,
  createConsoleLogger,
  describeError,
  resolveConfig,
  validateConfig
} from '../src/index.js'

const config = resolveConfig(process.env)
const logger = createConsoleLogger({ verbose: config.verbose })

const problems = validateConfig(config)
if (problems.length > 0) {
  for (const problem of problems) {
    logger.error(problem)
  }
  process.exit(1)
}

const server = new TranscriptionServer({
  port: config.port,
  host: config.host,
  websocket: {
    path: config.wsPath,
    pingInterval: config.pingIntervalMs,
    maxPayload: config.maxPayloadBytes
  },
  session: {
    maxBytes: config.maxSessionBytes,
    maxChunks: config.maxChunks
  },
  decoder: {
    ffmpegPath: config.ffmpegPath,
    timeoutMs: config.decodeTimeoutMs,
    minBytes: config.minDecodeBytes,
    logger
  },
  minChunkBytes: config.minChunkBytes,
  logger
})

const main = async (): Promise<void> => {
  await server.start()

  if (!config.whisperModel) {
    logger.warn('TRANSCRIBE_WHISPER_MODEL is not set; transcription requests will be refused')
    return
  }

  const engine = await WhisperCppEngine.initialize({
    binaryPath: config.whisperBinary,
    modelPath: config.whisperModel,
    language: config.whisperLanguage,
    threads: config.whisperThreads,
    timeoutMs: config.whisperTimeoutMs,
    logger
  })
  server.attachEngine(engine)

  logger.info(`WebSocket: ws://${config.host}:${config.port}${config.wsPath}`)
  logger.info(`HTTP: POST http://${config.host}:${config.port}/api/transcribe`)
}

const shutdown = (): void => {
  logger.info('Shutting down...')
  server.stop()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      logger.error('Error during shutdown', { error: describeError(error) })
      process.exit(1)
    })
}

process.on('SIGINT', shutdown)
process.on('SIGTERM', shutdown)

main().catch((error: unknown) => {
  logger.error('Failed to start transcription server', { error: describeError(error) })
  process.exit(1)
})
