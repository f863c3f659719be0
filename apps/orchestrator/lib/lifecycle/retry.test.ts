import { StartError } from '@berth/core'
import { describe, expect, test, vi } from 'vitest'
import { backoffDelay, withRetry } from './retry'

const policy = { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 4 }

function transient(message: string) {
  return new StartError('web', message, { transient: true })
}

describe('backoffDelay', () => {
  test('doubles up to the maximum', () => {
    const p = { maxAttempts: 10, baseDelayMs: 500, maxDelayMs: 3000 }
    expect([1, 2, 3, 4, 5].map((n) => backoffDelay(n, p))).toEqual([500, 1000, 2000, 3000, 3000])
  })

  test('honours a custom factor', () => {
    expect(backoffDelay(3, { maxAttempts: 5, baseDelayMs: 100, maxDelayMs: 10000, factor: 3 })).toBe(
      900,
    )
  })
})

describe('withRetry', () => {
  test('returns the first successful result', async () => {
    const fn = vi.fn(async () => 'ok')

    expect(await withRetry(fn, policy)).toBe('ok')
    expect(fn).toHaveBeenCalledTimes(1)
  })

  test('attempts a permanent error exactly once', async () => {
    const error = new StartError('web', 'no such image', { transient: false })
    const fn = vi.fn(async () => {
      throw error
    })

    await expect(withRetry(fn, policy)).rejects.toBe(error)
    expect(fn).toHaveBeenCalledTimes(1)
  })

  test('retries a transient error up to the cap and keeps the last error', async () => {
    let attempt = 0
    const fn = vi.fn(async () => {
      attempt++
      throw transient(`timeout ${attempt}`)
    })
    const onRetry = vi.fn()

    await expect(withRetry(fn, { ...policy, onRetry })).rejects.toThrow('start web: timeout 3')
    expect(fn).toHaveBeenCalledTimes(3)
    expect(onRetry.mock.calls.map((call) => [call[1], call[2]])).toEqual([
      [1, 1],
      [2, 2],
    ])
  })

  test('recovers when a transient error clears', async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(transient('busy'))
      .mockResolvedValueOnce('ok')

    expect(await withRetry(fn, policy)).toBe('ok')
    expect(fn).toHaveBeenCalledTimes(2)
  })

  test('stops retrying once aborted', async () => {
    const controller = new AbortController()
    controller.abort()
    const fn = vi.fn(async () => {
      throw transient('busy')
    })

    await expect(withRetry(fn, { ...policy, signal: controller.signal })).rejects.toThrow('busy')
    expect(fn).toHaveBeenCalledTimes(1)
  })
})
