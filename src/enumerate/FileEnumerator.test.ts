import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { collectFiles, enumerateFiles } from './FileEnumerator'
import { DirectoryError } from '../errors'
import fs from 'fs'
import path from 'path'
import os from 'os'

describe('FileEnumerator', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'enumerator-test-'))
  })

  afterEach(() => {
    vi.restoreAllMocks()
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  it('should list every file below the root, hidden ones included', async () => {
    fs.writeFileSync(path.join(tempDir, 'top.txt'), 'top')
    fs.writeFileSync(path.join(tempDir, '.hidden'), 'hidden')
    fs.mkdirSync(path.join(tempDir, 'a', 'b', 'c'), { recursive: true })
    fs.writeFileSync(path.join(tempDir, 'a', 'one.txt'), '1')
    fs.writeFileSync(path.join(tempDir, 'a', 'b', 'c', 'deep.txt'), 'deep')
    fs.mkdirSync(path.join(tempDir, '.config'))
    fs.writeFileSync(path.join(tempDir, '.config', 'settings'), 's')

    const files = await collectFiles(tempDir)

    expect(files.sort()).toEqual(
      [
        path.join(tempDir, '.config', 'settings'),
        path.join(tempDir, '.hidden'),
        path.join(tempDir, 'a', 'b', 'c', 'deep.txt'),
        path.join(tempDir, 'a', 'one.txt'),
        path.join(tempDir, 'top.txt'),
      ].sort()
    )
  })

  it('should not yield directories, even empty ones', async () => {
    fs.mkdirSync(path.join(tempDir, 'empty'))
    fs.mkdirSync(path.join(tempDir, 'full'))
    fs.writeFileSync(path.join(tempDir, 'full', 'file'), 'x')

    expect(await collectFiles(tempDir)).toEqual([path.join(tempDir, 'full', 'file')])
  })

  it('should yield absolute paths for a relative root', async () => {
    fs.writeFileSync(path.join(tempDir, 'file.txt'), 'x')
    const relativeRoot = path.relative(process.cwd(), tempDir)

    expect(await collectFiles(relativeRoot)).toEqual([path.join(tempDir, 'file.txt')])
  })

  it('should yield file symlinks and skip directory symlinks', async () => {
    fs.writeFileSync(path.join(tempDir, 'target.txt'), 'target')
    fs.mkdirSync(path.join(tempDir, 'dir'))
    fs.writeFileSync(path.join(tempDir, 'dir', 'inner.txt'), 'inner')
    fs.symlinkSync(path.join(tempDir, 'target.txt'), path.join(tempDir, 'link.txt'))
    fs.symlinkSync(path.join(tempDir, 'dir'), path.join(tempDir, 'dir-link'))

    const files = await collectFiles(tempDir)

    expect(files.sort()).toEqual(
      [
        path.join(tempDir, 'dir', 'inner.txt'),
        path.join(tempDir, 'link.txt'),
        path.join(tempDir, 'target.txt'),
      ].sort()
    )
  })

  it('should yield dangling symlinks so their failure is recorded', async () => {
    fs.symlinkSync(path.join(tempDir, 'gone'), path.join(tempDir, 'dangling'))

    expect(await collectFiles(tempDir)).toEqual([path.join(tempDir, 'dangling')])
  })

  it('should be lazy', async () => {
    fs.writeFileSync(path.join(tempDir, 'one'), '1')
    fs.writeFileSync(path.join(tempDir, 'two'), '2')

    const iterator = enumerateFiles(tempDir)
    const first = await iterator.next()

    expect(first.done).toBe(false)
    await iterator.return(undefined)
  })

  it('should throw DirectoryError when the root does not exist', async () => {
    const missing = path.join(tempDir, 'missing')

    await expect(collectFiles(missing)).rejects.toBeInstanceOf(DirectoryError)
    await expect(collectFiles(missing)).rejects.toMatchObject({ directory: missing })
  })

  it('should throw DirectoryError when the root is a file', async () => {
    const file = path.join(tempDir, 'file.txt')
    fs.writeFileSync(file, 'x')

    await expect(collectFiles(file)).rejects.toThrow(`Cannot read directory ${file}: not a directory`)
  })

  it('should throw DirectoryError for a subdirectory that cannot be listed', async () => {
    fs.writeFileSync(path.join(tempDir, 'top.txt'), 'top')
    const locked = path.join(tempDir, 'locked')
    fs.mkdirSync(locked)
    fs.writeFileSync(path.join(locked, 'secret'), 'x')

    const readdir = fs.promises.readdir
    vi.spyOn(fs.promises, 'readdir').mockImplementation(async (dir, options) => {
      if (dir === locked) {
        throw Object.assign(new Error(`EACCES: permission denied, scandir '${locked}'`), { code: 'EACCES' })
      }
      return readdir(dir, options)
    })

    await expect(collectFiles(tempDir)).rejects.toMatchObject({
      name: 'DirectoryError',
      directory: locked,
      message: `Cannot read directory ${locked}: EACCES: permission denied, scandir '${locked}'`,
    })
  })
})
