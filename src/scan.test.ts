import { symlink } from 'node:fs/promises'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { ProbeError } from './errors.js'
import { createBinaryFilter } from './filter.js'
import { createFileCommandProbe, findBinaries, isTextual } from './scan.js'
import {
  createFakeProbe,
  createTempDir,
  ELF_CONTENT,
  SCRIPT_CONTENT,
  writeTree,
} from './test-utils.js'

const ELF_TYPE = 'ELF 64-bit LSB executable, x86-64'

describe('isTextual', () => {
  it.each([
    ['POSIX shell script, ASCII text executable', true],
    ['Perl script text executable', true],
    [ELF_TYPE, false],
    ['Mach-O 64-bit executable arm64', false],
  ])('%s -> %s', (description, expected) => {
    expect(isTextual(description)).toBe(expected)
  })
})

describe('findBinaries', () => {
  let root: string
  let cleanup: () => Promise<void>

  beforeEach(async () => {
    ;({ path: root, cleanup } = await createTempDir())
    await writeTree(root, {
      'bin/foo': { content: ELF_CONTENT, mode: 0o755 },
      'bin/foo.exe': { content: ELF_CONTENT },
      'bin/bar': { content: ELF_CONTENT, mode: 0o755 },
      'bin/run.sh': { content: SCRIPT_CONTENT, mode: 0o755 },
      'lib/libfoo.so': { content: ELF_CONTENT },
      'share/TOOL.EXE': { content: 'data' },
    })
  })

  afterEach(async () => {
    await cleanup()
  })

  it('finds executables and .exe files, skipping scripts and libraries', async () => {
    const probe = createFakeProbe()

    const binaries = await findBinaries({ directory: root, filter: null, probe })

    expect(binaries).toEqual([
      {
        path: join(root, 'share', 'TOOL.EXE'),
        fileName: 'TOOL.EXE',
        name: 'TOOL',
        contentType: null,
      },
      {
        path: join(root, 'bin', 'bar'),
        fileName: 'bar',
        name: 'bar',
        contentType: ELF_TYPE,
      },
      {
        path: join(root, 'bin', 'foo'),
        fileName: 'foo',
        name: 'foo',
        contentType: ELF_TYPE,
      },
      {
        path: join(root, 'bin', 'foo.exe'),
        fileName: 'foo.exe',
        name: 'foo',
        contentType: null,
      },
    ])
  })

  it('matches a filter entry against both foo and foo.exe once each', async () => {
    const binaries = await findBinaries({
      directory: root,
      filter: createBinaryFilter(['foo'], 'test'),
      probe: createFakeProbe(),
    })

    expect(binaries.map((binary) => binary.path)).toEqual([
      join(root, 'bin', 'foo'),
      join(root, 'bin', 'foo.exe'),
    ])
  })

  it('returns nothing and probes nothing when the filter matches no file', async () => {
    const probe = createFakeProbe()

    const binaries = await findBinaries({
      directory: root,
      filter: createBinaryFilter(['missing-tool'], 'test'),
      probe,
    })

    expect(binaries).toEqual([])
    expect(probe.calls).toEqual([])
  })

  it('follows file symlinks and skips dangling ones', async () => {
    await symlink('foo', join(root, 'bin', 'foo-link'))
    await symlink('nowhere', join(root, 'bin', 'ghost'))

    const binaries = await findBinaries({
      directory: root,
      filter: createBinaryFilter(['foo-link', 'ghost'], 'test'),
      probe: createFakeProbe(),
    })

    expect(binaries.map((binary) => binary.fileName)).toEqual(['foo-link'])
  })

  it('surfaces probe failures', async () => {
    await expect(
      findBinaries({
        directory: root,
        filter: createBinaryFilter(['bar'], 'test'),
        probe: createFileCommandProbe('binharvest-missing-probe-command'),
      }),
    ).rejects.toBeInstanceOf(ProbeError)
  })
})
