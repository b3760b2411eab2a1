/**
 * Stream Adapter Factory Tests
 */

import { describe, it, expect, vi } from 'vitest'
import { ReadableStream, TransformStream, WritableStream } from 'node:stream/web'
import {
  createStreamAdapter,
  isAsyncSink,
  isSequence,
  isWebReadableStream,
  isWebWritableStream,
} from '../../../src/streams/adapter'
import { collectSequence } from '../../../src/streams/sequence'
import { Ok } from '../../../src/types/result'
import { ConfigurationError, ErrorCode } from '../../../src/errors'
import { arrayToSequence, readableOf, recordingSink, recordingWritable } from '../../helpers/streams'

describe('createStreamAdapter', () => {
  describe('ReadableStream input', () => {
    it('reads the stream as a sequence', async () => {
      const adapter = createStreamAdapter(readableOf([1, 2]))

      expect(await collectSequence(adapter.toSequence())).toEqual(Ok([1, 2]))
    })

    it('iterates the chunks directly', async () => {
      const chunks: string[] = []

      for await (const chunk of createStreamAdapter(readableOf(['x', 'y'])).toAsyncIterator()) {
        chunks.push(chunk)
      }

      expect(chunks).toEqual(['x', 'y'])
    })

    it('pipes to a writable stream', async () => {
      const target = recordingWritable<number>()

      await createStreamAdapter(readableOf([1, 2, 3])).pipeTo(target.stream)

      expect(target.chunks).toEqual([1, 2, 3])
      expect(target.closed()).toBe(true)
    })

    it('tees into two adapters that see every chunk', async () => {
      const [left, right] = createStreamAdapter(readableOf([1, 2])).tee()

      const [a, b] = await Promise.all([
        collectSequence(left.toSequence()),
        collectSequence(right.toSequence()),
      ])

      expect(a).toEqual(Ok([1, 2]))
      expect(b).toEqual(Ok([1, 2]))
    })

    it('cancels the stream', async () => {
      const cancel = vi.fn()
      const adapter = createStreamAdapter(readableOf([1], cancel))

      await adapter.cancel('done')

      expect(cancel).toHaveBeenCalledWith('done')
    })
  })

  describe('WritableStream input', () => {
    it('drives the stream as a sink', async () => {
      const target = recordingWritable<string>()
      const sink = createStreamAdapter(target.stream).toSink()

      await sink.send('hello')
      await sink.close()

      expect(target.chunks).toEqual(['hello'])
    })

    it('aborts the stream', async () => {
      const target = recordingWritable<string>()

      await createStreamAdapter(target.stream).abort('stop')

      expect(target.abort).toHaveBeenCalledWith('stop')
    })
  })

  describe('sequence input', () => {
    it('exposes the sequence as a readable stream', async () => {
      const stream = createStreamAdapter(arrayToSequence([Ok(1), Ok(2)])).toWebReadable()
      const chunks: number[] = []

      for await (const chunk of stream) {
        chunks.push(chunk)
      }

      expect(chunks).toEqual([1, 2])
    })

    it('applies the queuing options', async () => {
      const stream = createStreamAdapter(arrayToSequence([Ok(1)]), { highWaterMark: 0 }).toWebReadable()

      expect(stream.locked).toBe(false)
      await expect(collectSequence(createStreamAdapter(stream).toSequence())).resolves.toEqual(Ok([1]))
    })

    it('pipes into a writable stream', async () => {
      const target = recordingWritable<number>()

      await createStreamAdapter(arrayToSequence([Ok(4), Ok(5)])).pipeTo(target.stream)

      expect(target.chunks).toEqual([4, 5])
    })

    it('pipes through a stream pair', async () => {
      const doubled = new TransformStream<number, number>({
        transform(chunk, controller) {
          controller.enqueue(chunk * 2)
        },
      })

      const output = createStreamAdapter(arrayToSequence([Ok(1), Ok(2)])).pipeThrough(doubled)

      expect(await collectSequence(output.toSequence())).toEqual(Ok([2, 4]))
    })
  })

  describe('sink input', () => {
    it('exposes the sink as a writable stream', async () => {
      const { sink, calls } = recordingSink<number>()
      const writer = createStreamAdapter(sink).toWebWritable().getWriter()

      await writer.write(7)
      await writer.close()

      expect(calls).toEqual(['ready', 'send:7', 'flush', 'close'])
    })
  })

  it('throws ConfigurationError for an unknown input', () => {
    const { sink } = recordingSink<number>()
    Object.defineProperty(sink, 'send', { value: 'not a function' })

    let thrown: unknown
    try {
      createStreamAdapter(sink)
    } catch (error) {
      thrown = error
    }

    expect(thrown).toBeInstanceOf(ConfigurationError)
    if (thrown instanceof ConfigurationError) {
      expect(thrown.code).toBe(ErrorCode.INVALID_INPUT)
      expect(thrown.context.input).toBe('Object')
    }
  })
})

describe('type guards', () => {
  it('recognizes host streams', () => {
    expect(isWebReadableStream(new ReadableStream())).toBe(true)
    expect(isWebReadableStream(new WritableStream())).toBe(false)
    expect(isWebWritableStream(new WritableStream())).toBe(true)
    expect(isWebWritableStream(new ReadableStream())).toBe(false)
  })

  it('recognizes sequences', () => {
    expect(isSequence(arrayToSequence([Ok(1)]))).toBe(true)
    expect(isSequence({ next: async () => ({ done: true, value: undefined }) })).toBe(true)
    expect(isSequence({})).toBe(false)
    expect(isSequence(null)).toBe(false)
    expect(isSequence('abc')).toBe(false)
  })

  it('recognizes sinks', () => {
    expect(isAsyncSink(recordingSink().sink)).toBe(true)
    expect(isAsyncSink({ send: async () => {} })).toBe(false)
  })
})
