/**
 * ReadableStream → Sequence Tests
 */

import { describe, it, expect, vi } from 'vitest'
import { ReadableStream } from 'node:stream/web'
import { ReaderSequence, sequenceFromReadable } from '../../../src/streams/reader-sequence'
import { CancellationSource } from '../../../src/streams/cancellation'
import { Err, Ok } from '../../../src/types/result'
import { LockError, isLockError } from '../../../src/errors'
import { setLogger, type Logger } from '../../../src/utils/logger'
import { readableOf, tick } from '../../helpers/streams'

function failingAfter<T>(items: T[], error: unknown): ReadableStream<T> {
  let index = 0
  return new ReadableStream<T>({
    pull(controller) {
      const item = items[index]
      index++
      if (item === undefined) {
        controller.error(error)
      } else {
        controller.enqueue(item)
      }
    },
  }, { highWaterMark: 0 })
}

function silentStream<T>(cancel = vi.fn()): ReadableStream<T> {
  return new ReadableStream<T>({ cancel }, { highWaterMark: 0 })
}

describe('sequenceFromReadable', () => {
  describe('reading', () => {
    it('yields Ok for each chunk, then ends', async () => {
      const sequence = sequenceFromReadable(readableOf([1, 2, 3]))

      expect(await sequence.next()).toEqual({ done: false, value: Ok(1) })
      expect(await sequence.next()).toEqual({ done: false, value: Ok(2) })
      expect(await sequence.next()).toEqual({ done: false, value: Ok(3) })
      expect(await sequence.next()).toEqual({ done: true, value: undefined })
      expect(sequence.isTerminated).toBe(true)
    })

    it('works with for await', async () => {
      const values: string[] = []

      for await (const result of sequenceFromReadable(readableOf(['a', 'b']))) {
        if (result.ok) values.push(result.value)
      }

      expect(values).toEqual(['a', 'b'])
    })

    it('serves concurrent next() calls in call order', async () => {
      const sequence = sequenceFromReadable(readableOf([1, 2]))

      const results = await Promise.all([sequence.next(), sequence.next(), sequence.next()])

      expect(results).toEqual([
        { done: false, value: Ok(1) },
        { done: false, value: Ok(2) },
        { done: true, value: undefined },
      ])
    })

    it('releases the lock when the stream closes', async () => {
      const stream = readableOf([1])
      const sequence = sequenceFromReadable(stream)

      await sequence.next()
      expect(stream.locked).toBe(true)

      await sequence.next()
      expect(stream.locked).toBe(false)
    })
  })

  describe('errors', () => {
    it('yields the stream error once as Err, then ends', async () => {
      const stream = failingAfter([1], 'boom')
      const sequence = sequenceFromReadable(stream)

      expect(await sequence.next()).toEqual({ done: false, value: Ok(1) })
      expect(await sequence.next()).toEqual({ done: false, value: Err('boom') })
      expect(await sequence.next()).toEqual({ done: true, value: undefined })
      expect(stream.locked).toBe(false)
    })

    it('relays the error by identity', async () => {
      const failure = new Error('disk gone')
      const sequence = sequenceFromReadable(failingAfter([], failure))

      const step = await sequence.next()

      expect(step.done).toBe(false)
      expect(step.value).toEqual({ ok: false, error: failure })
      if (!step.done && !step.value.ok) {
        expect(step.value.error).toBe(failure)
      }
    })
  })

  describe('locking', () => {
    it('throws LockError when the stream is already locked', () => {
      const stream = readableOf([1])
      stream.getReader()

      expect(() => sequenceFromReadable(stream)).toThrow(LockError)
    })

    it('keeps the host error as the cause', () => {
      const stream = readableOf([1])
      stream.getReader()

      let thrown: unknown
      try {
        ReaderSequence.acquire(stream)
      } catch (error) {
        thrown = error
      }

      expect(isLockError(thrown)).toBe(true)
      if (isLockError(thrown)) {
        expect(thrown.kind).toBe('reader')
        expect(thrown.cause).toBeInstanceOf(TypeError)
      }
    })

    it('releases the lock on return() so the stream can be read again', async () => {
      const stream = readableOf([1, 2])
      const sequence = sequenceFromReadable(stream)

      expect(await sequence.next()).toEqual({ done: false, value: Ok(1) })
      await sequence.return()

      expect(stream.locked).toBe(false)
      expect(await sequence.next()).toEqual({ done: true, value: undefined })
      expect(await stream.getReader().read()).toEqual({ done: false, value: 2 })
    })

    it('discards a pending read on return()', async () => {
      const stream = silentStream<number>()
      const sequence = sequenceFromReadable(stream)

      const pending = sequence.next()
      await tick()
      await sequence.return()

      expect(stream.locked).toBe(false)
      expect(await pending).toEqual({ done: true, value: undefined })
    })

    it('treats a repeated return() as a no-op', async () => {
      const stream = readableOf([1])
      const sequence = sequenceFromReadable(stream)

      await sequence.return()
      await sequence.return()

      expect(stream.locked).toBe(false)
    })
  })

  describe('cancellation', () => {
    it('ends after the first chunk when the token fires', async () => {
      const cancel = vi.fn()
      const stream = new ReadableStream<number>({
        start(controller) {
          controller.enqueue(1)
        },
        cancel,
      })
      const source = new CancellationSource()
      const sequence = sequenceFromReadable(stream, { signal: source.token })

      expect(await sequence.next()).toEqual({ done: false, value: Ok(1) })
      const pending = sequence.next()
      await tick()
      source.cancel('stop')

      expect(await pending).toEqual({ done: true, value: undefined })
      expect(cancel).toHaveBeenCalledTimes(1)
      expect(cancel).toHaveBeenCalledWith('stop')
      expect(stream.locked).toBe(false)
    })

    it('accepts an AbortSignal', async () => {
      const cancel = vi.fn()
      const controller = new AbortController()
      const sequence = sequenceFromReadable(silentStream<number>(cancel), { signal: controller.signal })

      const pending = sequence.next()
      await tick()
      controller.abort('navigated away')

      expect(await pending).toEqual({ done: true, value: undefined })
      expect(cancel).toHaveBeenCalledWith('navigated away')
    })

    it('ends before reading when the token already fired', async () => {
      const cancel = vi.fn()
      const source = new CancellationSource()
      source.cancel('early')
      const sequence = sequenceFromReadable(readableOf([1], cancel), { signal: source.token })

      expect(await sequence.next()).toEqual({ done: true, value: undefined })
      expect(cancel).toHaveBeenCalledWith('early')
    })

    it('logs a rejected cancellation instead of raising it', async () => {
      const warn = vi.fn()
      const log: Logger = { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() }
      setLogger(log)
      const source = new CancellationSource()
      const stream = new ReadableStream<number>({
        cancel: () => Promise.reject('refused'),
      }, { highWaterMark: 0 })
      const sequence = sequenceFromReadable(stream, { signal: source.token })

      const pending = sequence.next()
      await tick()
      source.cancel('stop')

      expect(await pending).toEqual({ done: true, value: undefined })
      expect(warn).toHaveBeenCalledWith('Readable stream rejected cancellation', 'refused')
    })

    it('cancel() forwards the reason and ends the sequence', async () => {
      const cancel = vi.fn()
      const stream = readableOf([1, 2], cancel)
      const sequence = sequenceFromReadable(stream)

      await sequence.cancel('bye')

      expect(cancel).toHaveBeenCalledWith('bye')
      expect(sequence.isTerminated).toBe(true)
      expect(stream.locked).toBe(false)
      expect(await sequence.next()).toEqual({ done: true, value: undefined })
    })

    it('returns the first outcome to a repeated cancel()', async () => {
      const cancel = vi.fn(() => Promise.reject('refused'))
      const sequence = sequenceFromReadable(new ReadableStream<number>({ cancel }))

      const first = sequence.cancel('a')
      const second = sequence.cancel('b')

      expect(second).toBe(first)
      await expect(first).rejects.toBe('refused')
      await expect(sequence.cancel('c')).rejects.toBe('refused')
      expect(cancel).toHaveBeenCalledTimes(1)
      expect(cancel).toHaveBeenCalledWith('a')
    })

    it('cancel() rejects with the host error', async () => {
      const stream = new ReadableStream<number>({
        cancel: () => Promise.reject('refused'),
      })
      const sequence = sequenceFromReadable(stream)

      await expect(sequence.cancel('bye')).rejects.toBe('refused')
      expect(sequence.isTerminated).toBe(true)
    })
  })
})
