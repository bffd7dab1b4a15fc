import { mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import AdmZip from 'adm-zip'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { ArchiveError, FilesystemError } from '../src/errors/index.js'
import { extractZip, makeExecutable } from '../src/extract.js'
import { getPlatformInfo } from '../src/platform.js'

describe('extractZip', () => {
  let root: string

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'driverdock-extract-'))
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  it('keeps the archive directory structure', async () => {
    const zip = new AdmZip()
    zip.addFile('chromedriver-win64/chromedriver.exe', Buffer.from('driver'))
    zip.addFile('chromedriver-win64/LICENSE.chromedriver', Buffer.from('license'))

    const entries = await extractZip({ data: zip.toBuffer(), destination: root })

    expect(entries).toEqual([
      'chromedriver-win64/chromedriver.exe',
      'chromedriver-win64/LICENSE.chromedriver',
    ])
    await expect(
      readFile(join(root, 'chromedriver-win64', 'chromedriver.exe'), 'utf8'),
    ).resolves.toBe('driver')
    await expect(
      readFile(join(root, 'chromedriver-win64', 'LICENSE.chromedriver'), 'utf8'),
    ).resolves.toBe('license')
  })

  it('rejects bytes that are not a zip', async () => {
    const error = await extractZip({
      data: Buffer.from('this is not a zip archive'),
      destination: root,
    }).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ArchiveError)
    expect(error).toMatchObject({ destination: root, code: 'DD104' })
  })

  it('rejects an entry whose compressed data is corrupt', async () => {
    const zip = new AdmZip()
    zip.addFile('chromedriver-win64/chromedriver.exe', Buffer.alloc(5000, 'driver'))
    const data = zip.toBuffer()
    data.fill(0xff, 60, 76)

    const error = await extractZip({ data, destination: root }).catch(
      (e: unknown) => e,
    )

    expect(error).toBeInstanceOf(ArchiveError)
    expect(error).toMatchObject({ destination: root })
  })
})

describe.skipIf(process.platform === 'win32')('makeExecutable', () => {
  let root: string

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'driverdock-chmod-'))
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  it('sets mode 0755', async () => {
    const file = join(root, 'tool')
    await writeFile(file, 'binary', { mode: 0o600 })

    await makeExecutable(file)

    expect((await stat(file)).mode & 0o777).toBe(0o755)
  })

  it('leaves Windows files alone', async () => {
    const file = join(root, 'missing.exe')

    await expect(
      makeExecutable(file, getPlatformInfo({ os: 'win32', arch: 'x64' })),
    ).resolves.toBeUndefined()
  })

  it('reports a missing file', async () => {
    const file = join(root, 'missing')

    const error = await makeExecutable(file).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(FilesystemError)
    expect(error).toMatchObject({ path: file })
  })
})
