import { describe, it, expect, vi, afterEach } from 'vitest'
import { LatestValueChannel } from '../../src/channel'
import { PreviewStreamer } from '../../src/preview'
import { ResourceClosedError, TimeoutError } from '../../src/errors'

describe('LatestValueChannel', () => {
  it('should keep only the newest value with increasing versions', () => {
    const channel = new LatestValueChannel<string>()
    expect(channel.latest()).toBeUndefined()
    expect(channel.publish('a')).toBe(1)
    expect(channel.publish('b')).toBe(2)
    expect(channel.latest()).toEqual({ value: 'b', version: 2 })
  })

  it('should resolve next immediately when a newer value exists', async () => {
    const channel = new LatestValueChannel<number>()
    channel.publish(10)
    expect(await channel.next()).toEqual({ value: 10, version: 1 })
  })

  it('should wait for a value newer than the given version', async () => {
    const channel = new LatestValueChannel<number>()
    channel.publish(10)
    const pending = channel.next({ after: 1 })
    channel.publish(20)
    channel.publish(30)
    expect(await pending).toEqual({ value: 20, version: 2 })
    expect(await channel.next({ after: 2 })).toEqual({ value: 30, version: 3 })
  })

  it('should time out when nothing new arrives', async () => {
    const channel = new LatestValueChannel<number>()
    channel.publish(1)
    channel.publish(2)
    await expect(channel.next({ after: 2, timeoutMs: 10 })).rejects.toThrow(TimeoutError)
    await expect(channel.next({ after: 2, timeoutMs: 10 })).rejects.toThrow(
      'Timed out waiting for a value after version 2'
    )
  })

  it('should reject waiters and publishers once closed', async () => {
    const channel = new LatestValueChannel<number>()
    const pending = channel.next()
    channel.close()
    channel.close()

    await expect(pending).rejects.toThrow(ResourceClosedError)
    await expect(channel.next()).rejects.toThrow('Channel is closed')
    expect(() => channel.publish(1)).toThrow(ResourceClosedError)
    expect(channel.closed).toBe(true)
  })

  it('should still hand out the last value after close', async () => {
    const channel = new LatestValueChannel<number>()
    channel.publish(5)
    channel.close()
    expect(await channel.next()).toEqual({ value: 5, version: 1 })
  })
})

describe('PreviewStreamer', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should forward each new value to the sink', async () => {
    const channel = new LatestValueChannel<string>()
    const received: string[] = []
    const streamer = new PreviewStreamer(channel, (value, version) => {
      received.push(`${version}:${value}`)
    }, { pollTimeoutMs: 10 })

    streamer.start()
    expect(streamer.isRunning).toBe(true)
    channel.publish('first')
    await vi.waitFor(() => expect(streamer.delivered).toBe(1))
    channel.publish('second')
    await vi.waitFor(() => expect(streamer.delivered).toBe(2))

    await streamer.stop()
    expect(streamer.isRunning).toBe(false)
    expect(received).toEqual(['1:first', '2:second'])
  })

  it('should skip values published faster than the sink reads', async () => {
    const channel = new LatestValueChannel<number>()
    channel.publish(1)
    channel.publish(2)
    channel.publish(3)
    const received: number[] = []
    const streamer = new PreviewStreamer(channel, (value) => {
      received.push(value)
    }, { pollTimeoutMs: 10 })

    streamer.start()
    await vi.waitFor(() => expect(streamer.delivered).toBe(1))
    await streamer.stop()
    expect(received).toEqual([3])
  })

  it('should exit when the channel closes', async () => {
    const channel = new LatestValueChannel<number>()
    const streamer = new PreviewStreamer(channel, () => {}, { pollTimeoutMs: 1000 })
    streamer.start()
    channel.close()
    await vi.waitFor(() => expect(streamer.isRunning).toBe(false))
    await streamer.stop()
  })

  it('should stop on a sink failure and raise it from stop', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})
    const channel = new LatestValueChannel<number>()
    const streamer = new PreviewStreamer(channel, () => {
      throw new Error('socket closed')
    }, { pollTimeoutMs: 10 })

    streamer.start()
    channel.publish(1)
    await vi.waitFor(() => expect(streamer.isRunning).toBe(false))
    await expect(streamer.stop()).rejects.toThrow('socket closed')
    expect(error).toHaveBeenCalledWith('[computer-gym] Preview sink failed; streamer stopped', new Error('socket closed'))
    expect(channel.publish(2)).toBe(2)
  })
})
