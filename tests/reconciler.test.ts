import { describe, it, expect } from 'vitest'
import { EmptyAudioError } from '../src/core/errors.js'
import { SessionReconciler, concatenateFragments } from '../src/core/reconciler.js'
import type { AudioDecoder } from '../src/core/decoder.js'
import { CANONICAL_SAMPLE_RATE, type AudioFragment } from '../src/types/index.js'
import { FakeDecoder, FakeEngine } from './helpers.js'

const fragment = (sequence: number, data: Buffer, format = 'webm'): AudioFragment => ({
  sequence,
  data,
  format,
  sampleRate: 48000
})

describe('concatenateFragments', () => {
  it('joins payloads in sequence order regardless of input order', () => {
    const joined = concatenateFragments([
      fragment(2, Buffer.from('cd')),
      fragment(3, Buffer.from('e')),
      fragment(1, Buffer.from('ab'))
    ])

    expect(joined.toString()).toBe('abcde')
  })
})

describe('SessionReconciler', () => {
  it('decodes the whole stream once and returns a final result', async () => {
    const decoder = new FakeDecoder()
    const engine = new FakeEngine()
    const reconciler = new SessionReconciler(decoder, engine)

    const result = await reconciler.reconcile([
      fragment(1, Buffer.alloc(500)),
      fragment(2, Buffer.alloc(2500)),
      fragment(3, Buffer.alloc(2500))
    ])

    expect(result).toEqual({ text: 'heard 5500 samples', isFinal: true })
    expect(decoder.calls).toEqual([{ bytes: 5500, format: 'webm' }])
  })

  it('takes the container format from the first fragment', async () => {
    const decoder = new FakeDecoder()
    const reconciler = new SessionReconciler(decoder, new FakeEngine())

    await reconciler.reconcile([fragment(2, Buffer.alloc(300), 'wav'), fragment(1, Buffer.alloc(300), 'ogg')])

    expect(decoder.calls).toEqual([{ bytes: 600, format: 'ogg' }])
  })

  it('feeds the decoder the exact concatenated bytes', async () => {
    let seen: Buffer | null = null
    const decoder: AudioDecoder = {
      async decode(data) {
        seen = data
        return { samples: new Int16Array(10), sampleRate: CANONICAL_SAMPLE_RATE }
      }
    }
    const reconciler = new SessionReconciler(decoder, new FakeEngine(() => '  hello world  '))

    const result = await reconciler.reconcile([fragment(1, Buffer.from([1, 2])), fragment(2, Buffer.from([3]))])

    expect(seen).toEqual(Buffer.from([1, 2, 3]))
    expect(result.text).toBe('hello world')
  })

  it('fails fast when there are no fragments', async () => {
    const decoder = new FakeDecoder()
    const reconciler = new SessionReconciler(decoder, new FakeEngine())

    await expect(reconciler.reconcile([])).rejects.toThrow(EmptyAudioError)
    await expect(reconciler.reconcile([])).rejects.toThrow('No audio data received')
    expect(decoder.calls).toEqual([])
  })

  it('rejects fragments that carry no bytes', async () => {
    const reconciler = new SessionReconciler(new FakeDecoder(), new FakeEngine())

    await expect(reconciler.reconcile([fragment(1, Buffer.alloc(0))])).rejects.toThrow('Empty audio data')
  })

  it('propagates decode failures', async () => {
    const reconciler = new SessionReconciler(new FakeDecoder(), new FakeEngine())

    await expect(reconciler.reconcile([fragment(1, Buffer.alloc(400, 0xff))])).rejects.toThrow(
      'All conversion methods failed. Last error (fake: not a container)'
    )
  })
})
