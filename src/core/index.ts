export * from './audio-conversion.js'
export * from './chunk-processor.js'
export * from './decode-strategies.js'
export * from './decoder.js'
export * from './errors.js'
export * from './http.js'
export * from './logger.js'
export * from './pcm.js'
export * from './protocol.js'
export * from './reconciler.js'
export * from './session.js'
export * from './stream-session.js'
export * from './websocket.js'
