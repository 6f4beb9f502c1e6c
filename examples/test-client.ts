/**
 * Streams an audio file to the transcription server in base64 chunks,
 * the way a browser MediaRecorder would, then asks for the final result.
 *
 * Usage: node dist/examples/test-client.js <file> [format] [url]
 */

import { readFile } from 'node:fs/promises'
import { extname } from 'node:path'
import WebSocket from 'ws'

const CHUNK_BYTES = 16 * 1024
const CHUNK_INTERVAL_MS = 250

const [filePath, formatArg, urlArg] = process.argv.slice(2)

if (!filePath) {
  console.error('Usage: test-client <file> [format] [url]')
  process.exit(1)
}

const format = formatArg ?? (extname(filePath).slice(1) || 'webm')
const url = urlArg ?? 'ws://localhost:8001/ws/transcribe'

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms))

const run = async (): Promise<void> => {
  const audio = await readFile(filePath)
  console.log(`Streaming ${audio.length} bytes of ${format} to ${url}`)

  const ws = new WebSocket(url)

  ws.on('message', (data) => {
    console.log('← Server message:', data.toString())
  })

  ws.on('error', (error) => {
    console.error('✗ WebSocket error:', error.message)
  })

  const closed = new Promise<void>((resolve) => {
    ws.on('close', (code) => {
      console.log(`Connection closed (${code})`)
      resolve()
    })
  })

  await new Promise<void>((resolve, reject) => {
    ws.once('open', () => resolve())
    ws.once('error', reject)
  })

  for (let offset = 0; offset < audio.length; offset += CHUNK_BYTES) {
    const chunk = audio.subarray(offset, offset + CHUNK_BYTES)
    ws.send(JSON.stringify({
      type: 'audio_chunk',
      data: chunk.toString('base64'),
      format,
      sample_rate: 48000
    }))
    await sleep(CHUNK_INTERVAL_MS)
  }

  ws.send(JSON.stringify({ type: 'end' }))
  await closed
}

run().catch((error: unknown) => {
  console.error('Client failed:', error instanceof Error ? error.message : String(error))
  process.exit(1)
})
