/**
 * Tests for directory discovery and per-file batch processing
 */

import { promises as fs } from 'fs'
import {
  discoverMarkdownFiles,
  prepareDirectories,
  processDirectory,
  readTextFile
} from '../directory-processor.js'
import { DirectoryError, FileProcessingError } from '../errors.js'
import { createTempTree, type TempTree } from '../../tests/helpers/index.js'

describe('directory processor', () => {
  let tree: TempTree

  beforeEach(async () => {
    tree = await createTempTree()
  })

  afterEach(async () => {
    await tree.cleanup()
  })

  describe('prepareDirectories', () => {
    it('rejects a missing input directory', async () => {
      await expect(prepareDirectories(tree.resolve('missing'))).rejects.toBeInstanceOf(DirectoryError)
    })

    it('rejects an input path that is a file', async () => {
      await tree.write('file.md', 'x')
      await expect(prepareDirectories(tree.resolve('file.md'))).rejects.toBeInstanceOf(DirectoryError)
    })

    it('rejects an output path that is a file', async () => {
      await tree.write('in/a.md', 'x')
      await tree.write('out', 'x')
      await expect(
        prepareDirectories(tree.resolve('in'), tree.resolve('out'))
      ).rejects.toThrow('Output path exists but is not a directory')
    })

    it('creates a missing output directory', async () => {
      await tree.write('in/a.md', 'x')
      await prepareDirectories(tree.resolve('in'), tree.resolve('out/nested'))
      expect(await tree.exists('out/nested')).toBe(true)
    })
  })

  describe('discoverMarkdownFiles', () => {
    it('finds markdown files recursively in path order', async () => {
      await tree.write('in/b.md', '')
      await tree.write('in/a/z.md', '')
      await tree.write('in/a/notes.txt', '')
      await tree.write('in/c.markdown', '')
      await tree.write('in/A.md', '')

      const { files, unreadable } = await discoverMarkdownFiles(tree.resolve('in'))
      expect(files.map(file => file.relativePath)).toEqual(['A.md', 'a/z.md', 'b.md'])
      expect(files[1].absolutePath).toBe(tree.resolve('in/a/z.md'))
      expect(unreadable).toEqual([])
    })

    it('skips a subdirectory that cannot be listed', async () => {
      await tree.write('in/a.md', '')
      await tree.write('in/locked/hidden.md', '')
      await tree.write('in/open/b.md', '')
      const locked = tree.resolve('in/locked')

      const { files, unreadable } = await discoverMarkdownFiles(tree.resolve('in'), dir =>
        dir === locked
          ? Promise.reject(new Error('EACCES: permission denied'))
          : fs.readdir(dir, { withFileTypes: true })
      )

      expect(files.map(file => file.relativePath)).toEqual(['a.md', 'open/b.md'])
      expect(unreadable).toHaveLength(1)
      expect(unreadable[0].relativePath).toBe('locked')
      expect(unreadable[0].error.stage).toBe('read')
      expect(unreadable[0].error.message).toBe(`FILE_READ_FAILED: ${locked}: EACCES: permission denied`)
    })

    it('fails when the input directory itself cannot be listed', async () => {
      await tree.write('in/a.md', '')

      await expect(
        discoverMarkdownFiles(tree.resolve('in'), () => Promise.reject(new Error('EIO: i/o error')))
      ).rejects.toThrow('DIRECTORY_ERROR: Input directory cannot be listed (EIO: i/o error)')
    })
  })

  describe('readTextFile', () => {
    it('reads UTF-8 text', async () => {
      const target = await tree.write('a.md', 'Κείμενο\n')
      expect(await readTextFile(target)).toBe('Κείμενο\n')
    })

    it('rejects invalid UTF-8 as a read failure', async () => {
      const target = await tree.write('bad.md', new Uint8Array([0x41, 0xff, 0xfe]))
      await expect(readTextFile(target)).rejects.toMatchObject({
        name: 'FileProcessingError',
        stage: 'read'
      })
    })
  })

  describe('processDirectory', () => {
    it('reports an empty input directory', async () => {
      await tree.write('in/notes.txt', 'x')

      const { summary, results } = await processDirectory({
        inputDir: tree.resolve('in'),
        threads: 2,
        operation: content => ({ result: content.length })
      })

      expect(summary).toEqual({
        status: 'empty',
        message: 'No markdown files found in input directory.',
        totalFilesFound: 0,
        filesProcessed: 0,
        filesWithErrors: 0,
        errors: []
      })
      expect(results).toEqual([])
    })

    it('writes output under mirrored paths and records failures', async () => {
      await tree.write('in/a.md', 'one')
      await tree.write('in/sub/b.md', 'two')
      await tree.write('in/fail.md', 'three')

      const { summary, results } = await processDirectory({
        inputDir: tree.resolve('in'),
        outputDir: tree.resolve('out'),
        threads: 2,
        operation: (content, file) => {
          if (file.relativePath === 'fail.md') throw new Error('cannot process')
          return { content: content.toUpperCase(), result: content.length }
        }
      })

      expect(summary.status).toBe('completed')
      expect(summary.message).toBe('Operation completed on 2 files. Errors on 1 files.')
      expect(summary.totalFilesFound).toBe(3)
      expect(summary.errors).toEqual([{
        file: 'fail.md',
        errorType: 'processing',
        message: `FILE_PROCESSING_FAILED: ${tree.resolve('in/fail.md')}: cannot process`
      }])
      expect(results.map(({ file, result }) => [file.relativePath, result])).toEqual([
        ['a.md', 3],
        ['sub/b.md', 3]
      ])
      expect(await tree.read('out/a.md')).toBe('ONE')
      expect(await tree.read('out/sub/b.md')).toBe('TWO')
      expect(await tree.exists('out/fail.md')).toBe(false)
    })

    it('skips writing when there is no output directory', async () => {
      await tree.write('in/a.md', 'one')

      const { summary } = await processDirectory({
        inputDir: tree.resolve('in'),
        threads: 1,
        operation: content => ({ content, result: null })
      })

      expect(summary.filesProcessed).toBe(1)
      expect(await tree.exists('out')).toBe(false)
    })

    it('records an unreadable subdirectory and keeps going', async () => {
      await tree.write('in/a.md', 'one')
      await tree.write('in/locked/b.md', 'two')
      const locked = tree.resolve('in/locked')

      const { summary, results } = await processDirectory({
        inputDir: tree.resolve('in'),
        threads: 2,
        operation: content => ({ result: content.length }),
        readDirectory: dir =>
          dir === locked
            ? Promise.reject(new Error('EACCES: permission denied'))
            : fs.readdir(dir, { withFileTypes: true })
      })

      expect(results.map(({ file }) => file.relativePath)).toEqual(['a.md'])
      expect(summary.status).toBe('completed')
      expect(summary.filesProcessed).toBe(1)
      expect(summary.filesWithErrors).toBe(1)
      expect(summary.errors).toEqual([{
        file: 'locked',
        errorType: 'read',
        message: `FILE_READ_FAILED: ${locked}: EACCES: permission denied`
      }])
    })

    it('reports unreadable subdirectories even when no file was found', async () => {
      await tree.write('in/locked/b.md', 'two')
      const locked = tree.resolve('in/locked')

      const { summary } = await processDirectory({
        inputDir: tree.resolve('in'),
        threads: 1,
        operation: () => ({ result: null }),
        readDirectory: dir =>
          dir === locked
            ? Promise.reject(new Error('EACCES: permission denied'))
            : fs.readdir(dir, { withFileTypes: true })
      })

      expect(summary.status).toBe('empty')
      expect(summary.filesWithErrors).toBe(1)
      expect(summary.errors.map(failure => [failure.file, failure.errorType])).toEqual([['locked', 'read']])
    })

    it('limits the batch to the files the include filter accepts', async () => {
      await tree.write('in/keep.md', 'one')
      await tree.write('in/stale.md', 'two')

      const { summary, results } = await processDirectory({
        inputDir: tree.resolve('in'),
        threads: 1,
        operation: content => ({ result: content }),
        include: file => file.relativePath !== 'stale.md'
      })

      expect(summary.totalFilesFound).toBe(1)
      expect(results).toEqual([{
        file: { absolutePath: tree.resolve('in/keep.md'), relativePath: 'keep.md' },
        result: 'one'
      }])
    })

    it('fails the whole batch on a bad input directory', async () => {
      await expect(processDirectory({
        inputDir: tree.resolve('missing'),
        threads: 1,
        operation: () => ({ result: null })
      })).rejects.toBeInstanceOf(DirectoryError)
    })
  })
})

describe('FileProcessingError', () => {
  it('is what readTextFile throws for a missing file', async () => {
    await expect(readTextFile('/nonexistent/gazette/a.md')).rejects.toBeInstanceOf(FileProcessingError)
  })
})
