import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { join } from 'path'
import { RemoteFile, cachePath, withRemoteFile } from '../../src/remote_file'
import { NotFoundError, ResourceClosedError, ResourceSyncError } from '../../src/errors'
import { FakeComputer, makeTempDir, removeTempDir } from '../fixtures/helpers'

describe('RemoteFile', () => {
  let root: string
  let computer: FakeComputer

  beforeEach(async () => {
    root = await makeTempDir()
    computer = new FakeComputer(join(root, 'cache'))
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await removeTempDir(root)
  })

  describe('Opening', () => {
    it('should copy the remote file into a deterministic cache path', async () => {
      computer.files.set('/home/agent/notes.txt', Buffer.from('hello'))
      const file = await RemoteFile.open(computer, '/home/agent/notes.txt', 'r')

      expect(file.localPath).toBe(cachePath(computer.tempDir, '/home/agent/notes.txt'))
      expect(file.localPath.startsWith(join(root, 'cache'))).toBe(true)
      expect(file.localPath.endsWith('-notes.txt')).toBe(true)
      expect(await file.read()).toBe('hello')
      await file.close()
    })

    it('should give different remote paths with the same basename different cache files', () => {
      expect(cachePath('/tmp/c', '/a/notes.txt')).not.toBe(cachePath('/tmp/c', '/b/notes.txt'))
      expect(cachePath('/tmp/c', '/a/notes.txt')).toBe(cachePath('/tmp/c', '/a/notes.txt'))
    })

    it('should raise NotFoundError for a read-only open of a missing file', async () => {
      await expect(RemoteFile.open(computer, '/missing.txt', 'r')).rejects.toThrow(NotFoundError)
    })

    it('should raise ResourceSyncError when a read-only copy fails', async () => {
      computer.files.set('/data.txt', Buffer.from('x'))
      computer.failing = true
      await expect(RemoteFile.open(computer, '/data.txt', 'r')).rejects.toThrow(ResourceSyncError)
    })

    it('should start from an empty file when a writable copy fails', async () => {
      computer.files.set('/data.txt', Buffer.from('old'))
      computer.failing = true
      const file = await RemoteFile.open(computer, '/data.txt', 'r+')
      computer.failing = false

      expect(await file.read()).toBe('')
      expect(console.warn).toHaveBeenCalledWith(
        '[computer-gym] Could not copy /data.txt from computer; starting from an empty file'
      )
      await file.close()
    })

    it('should not contact the computer before writing in truncate mode', async () => {
      computer.files.set('/out.txt', Buffer.from('previous'))
      const file = await RemoteFile.open(computer, '/out.txt', 'w')
      expect(computer.remoteCalls).toBe(0)
      expect(file.readable()).toBe(false)
      expect(file.writable()).toBe(true)
      await file.close()
      // nothing written, nothing synced
      expect(computer.text('/out.txt')).toBe('previous')
    })
  })

  describe('Reading', () => {
    beforeEach(() => {
      computer.files.set('/log.txt', Buffer.from('first\nsecond\nthird'))
    })

    it('should read lines including their newline', async () => {
      const file = await RemoteFile.open(computer, '/log.txt')
      expect(await file.readline()).toBe('first\n')
      expect(await file.readline()).toBe('second\n')
      expect(await file.readline()).toBe('third')
      expect(await file.readline()).toBe('')
      await file.close()
    })

    it('should iterate and collect lines', async () => {
      const file = await RemoteFile.open(computer, '/log.txt')
      const seen: string[] = []
      for await (const line of file) seen.push(line)
      expect(seen).toEqual(['first\n', 'second\n', 'third'])

      await file.seek(0)
      expect(await file.readlines()).toEqual(['first\n', 'second\n', 'third'])
      await file.close()
    })

    it('should read bytes and track the position', async () => {
      const file = await RemoteFile.open(computer, '/log.txt', 'rb')
      const head = await file.readBytes(5)
      expect(Buffer.isBuffer(head)).toBe(true)
      expect(head.toString('utf-8')).toBe('first')
      expect(file.tell()).toBe(5)
      expect(await file.read()).toBe('\nsecond\nthird')
      await file.close()
    })

    it('should count text reads in characters without splitting them', async () => {
      computer.files.set('/accents.txt', Buffer.from('héllo wörld', 'utf-8'))
      const file = await RemoteFile.open(computer, '/accents.txt')
      expect(await file.read(2)).toBe('hé')
      expect(file.tell()).toBe(3)
      expect(await file.read(6)).toBe('llo wö')
      expect(await file.read()).toBe('rld')
      expect(await file.read(4)).toBe('')
      await file.close()
    })

    it('should seek relative to start, current position and end', async () => {
      const file = await RemoteFile.open(computer, '/log.txt')
      expect(await file.seek(6)).toBe(6)
      expect(await file.read(6)).toBe('second')
      expect(await file.seek(1, 1)).toBe(13)
      expect(await file.read()).toBe('third')
      expect(await file.seek(-5, 2)).toBe(13)
      await expect(file.seek(-1)).rejects.toThrow(RangeError)
      await file.close()
    })

    it('should refuse writes on a read-only handle', async () => {
      const file = await RemoteFile.open(computer, '/log.txt', 'r')
      await expect(file.write('x')).rejects.toThrow(TypeError)
      expect(file.dirty).toBe(false)
      await file.close()
    })
  })

  describe('Writing and syncing', () => {
    it('should mark the handle dirty on write and clean after flush', async () => {
      const file = await RemoteFile.open(computer, '/home/agent/out/result.txt', 'w')
      expect(file.dirty).toBe(false)

      expect(await file.write('hello ')).toBe(6)
      await file.writelines(['wor', 'ld'])
      expect(file.dirty).toBe(true)

      await file.flush()
      expect(file.dirty).toBe(false)
      expect(computer.text('/home/agent/out/result.txt')).toBe('hello world')
      expect(computer.dirs.has('/home/agent/out')).toBe(true)
      await file.close()
    })

    it('should read back what was written after reopening', async () => {
      const file = await RemoteFile.open(computer, '/doc.md', 'w+')
      await file.write('# Title\nbody\n')
      await file.close()

      const reopened = await RemoteFile.open(computer, '/doc.md', 'r')
      expect(await reopened.read()).toBe('# Title\nbody\n')
      await reopened.close()
    })

    it('should truncate on each write-mode open', async () => {
      let file = await RemoteFile.open(computer, '/t.txt', 'w')
      await file.write('a long first version')
      await file.close()

      file = await RemoteFile.open(computer, '/t.txt', 'w')
      await file.write('short')
      await file.close()

      expect(computer.text('/t.txt')).toBe('short')
    })

    it('should append at the end of the remote content', async () => {
      computer.files.set('/a.txt', Buffer.from('abc'))
      const file = await RemoteFile.open(computer, '/a.txt', 'a+')
      expect(file.tell()).toBe(3)

      await file.write('def')
      await file.seek(0)
      expect(await file.read()).toBe('abcdef')
      await file.seek(1)
      await file.write('!')
      await file.close()

      expect(computer.text('/a.txt')).toBe('abcdef!')
    })

    it('should overwrite in place with r+', async () => {
      computer.files.set('/r.txt', Buffer.from('hello world'))
      const file = await RemoteFile.open(computer, '/r.txt', 'r+')
      await file.seek(6)
      await file.write('WORLD')
      await file.close()
      expect(computer.text('/r.txt')).toBe('hello WORLD')
    })

    it('should stay dirty after a failed flush and recover on retry', async () => {
      computer.files.set('/sync.txt', Buffer.from('old'))
      computer.failing = true
      const file = await RemoteFile.open(computer, '/sync.txt', 'r+')

      await file.write('new content')
      await expect(file.flush()).rejects.toThrow(ResourceSyncError)
      expect(file.dirty).toBe(true)
      expect(computer.text('/sync.txt')).toBe('old')

      computer.failing = false
      await file.flush()
      expect(file.dirty).toBe(false)
      expect(computer.text('/sync.txt')).toBe('new content')
      await file.close()
    })

    it('should name the remote path on sync errors', async () => {
      const file = await RemoteFile.open(computer, '/w.txt', 'w')
      await file.write('x')
      computer.failing = true

      const error = await file.flush().catch((e: unknown) => e)
      expect(error).toBeInstanceOf(ResourceSyncError)
      expect(error).toMatchObject({ remotePath: '/w.txt', message: 'Failed to copy /w.txt to computer' })

      computer.failing = false
      await file.close()
    })

    it('should not sync a clean handle', async () => {
      computer.files.set('/clean.txt', Buffer.from('same'))
      const file = await RemoteFile.open(computer, '/clean.txt', 'r+')
      const callsAfterOpen = computer.remoteCalls
      await file.flush()
      await file.close()
      expect(computer.remoteCalls).toBe(callsAfterOpen)
    })
  })

  describe('Closing', () => {
    it('should flush on close and ignore a second close', async () => {
      const file = await RemoteFile.open(computer, '/c.txt', 'w')
      await file.write('data')
      await file.close()
      expect(file.closed).toBe(true)
      expect(computer.text('/c.txt')).toBe('data')

      await file.close()
      expect(file.closed).toBe(true)
    })

    it('should raise ResourceClosedError after close', async () => {
      computer.files.set('/c.txt', Buffer.from('data'))
      const file = await RemoteFile.open(computer, '/c.txt', 'r')
      await file.close()

      await expect(file.read()).rejects.toThrow(ResourceClosedError)
      expect(() => file.tell()).toThrow('Remote file /c.txt is closed')
      await expect(file.flush()).rejects.toThrow(ResourceClosedError)
    })

    it('should stay open when the final flush fails', async () => {
      const file = await RemoteFile.open(computer, '/c.txt', 'w')
      await file.write('pending')
      computer.failing = true

      await expect(file.close()).rejects.toThrow(ResourceSyncError)
      expect(file.closed).toBe(false)

      computer.failing = false
      await file.close()
      expect(file.closed).toBe(true)
      expect(computer.text('/c.txt')).toBe('pending')
    })
  })

  describe('withRemoteFile', () => {
    it('should return the callback result and close the handle', async () => {
      let handle: RemoteFile | undefined
      const written = await withRemoteFile(computer, '/scoped.txt', 'w', async (file) => {
        handle = file
        return file.write('scoped')
      })

      expect(written).toBe(6)
      expect(handle?.closed).toBe(true)
      expect(computer.text('/scoped.txt')).toBe('scoped')
    })

    it('should flush and close when the callback throws', async () => {
      let handle: RemoteFile | undefined
      await expect(
        withRemoteFile(computer, '/scoped.txt', 'w', async (file) => {
          handle = file
          await file.write('partial')
          throw new Error('boom')
        })
      ).rejects.toThrow('boom')

      expect(handle?.closed).toBe(true)
      expect(computer.text('/scoped.txt')).toBe('partial')
    })

    it('should release the handle and raise when the final flush fails', async () => {
      let handle: RemoteFile | undefined
      await expect(
        withRemoteFile(computer, '/scoped.txt', 'w', async (file) => {
          handle = file
          await file.write('lost')
          computer.failing = true
        })
      ).rejects.toThrow(ResourceSyncError)

      expect(handle?.closed).toBe(true)
      expect(handle?.dirty).toBe(true)
      expect(computer.files.has('/scoped.txt')).toBe(false)
    })

    it('should raise the callback error and log the sync error when both fail', async () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {})
      let handle: RemoteFile | undefined
      await expect(
        withRemoteFile(computer, '/scoped.txt', 'w', async (file) => {
          handle = file
          await file.write('lost')
          computer.failing = true
          throw new Error('boom')
        })
      ).rejects.toThrow('boom')

      expect(handle?.closed).toBe(true)
      expect(handle?.dirty).toBe(true)
      expect(error).toHaveBeenCalledWith(
        '[computer-gym] Could not sync /scoped.txt after the callback failed',
        expect.any(ResourceSyncError)
      )
    })
  })
})
