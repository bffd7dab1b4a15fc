import { mkdtemp, rm, stat, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { ensureCacheDir, getCacheDir } from '../src/cache.js'
import { FilesystemError } from '../src/errors/index.js'

describe('getCacheDir', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it('prefers the explicit directory', () => {
    vi.stubEnv('DRIVERDOCK_DIR', '/from/env')
    expect(getCacheDir({ cacheDir: '/explicit' })).toBe('/explicit')
  })

  it('falls back to DRIVERDOCK_DIR', () => {
    vi.stubEnv('DRIVERDOCK_DIR', '/from/env')
    expect(getCacheDir()).toBe('/from/env')
  })

  it.skipIf(process.platform === 'win32')('follows XDG_CACHE_HOME', () => {
    vi.stubEnv('DRIVERDOCK_DIR', '')
    vi.stubEnv('XDG_CACHE_HOME', '/tmp/xdg-cache')
    expect(getCacheDir()).toBe(join('/tmp/xdg-cache', 'driverdock'))
  })
})

describe('ensureCacheDir', () => {
  let root: string

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'driverdock-cache-'))
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  it('creates missing parents', async () => {
    const dir = join(root, 'a', 'b', 'c')
    await expect(ensureCacheDir({ cacheDir: dir })).resolves.toBe(dir)
    expect((await stat(dir)).isDirectory()).toBe(true)
  })

  it('reports the path it could not create', async () => {
    const file = join(root, 'occupied')
    await writeFile(file, 'not a directory')
    const dir = join(file, 'drivers')

    const error = await ensureCacheDir({ cacheDir: dir }).catch((e: unknown) => e)
    expect(error).toBeInstanceOf(FilesystemError)
    expect(error).toMatchObject({ path: dir, code: 'DD105' })
  })
})
