/**
 * Directory Processor
 *
 * Shared batch plumbing for every handler:
 * - validates the input/output directories up front (fatal)
 * - discovers `*.md` files recursively
 * - runs a per-file operation on the bounded worker pool
 * - writes transformed content under the output directory, mirroring the
 *   input's relative paths
 * - counts processed and errored files; one file's failure never stops the batch
 */

import { promises as fs, type Dirent } from 'fs'
import * as path from 'path'
import type { BatchSummary } from '../types/job-schemas.js'
import {
  DirectoryError,
  FileProcessingError,
  classifyFileError,
  toError
} from './errors.js'
import { createLogger } from './logger.js'
import { resolveConcurrency, runPool } from './worker-pool.js'

const log = createLogger('DirectoryProcessor')

const utf8Decoder = new TextDecoder('utf-8', { fatal: true })

export interface DiscoveredFile {
  /** Absolute path */
  absolutePath: string
  /** Path relative to the input directory, with forward slashes */
  relativePath: string
}

/**
 * What a per-file operation produced. `content` is written to the output
 * directory when one is configured.
 */
export interface FileOperationOutput<R> {
  content?: string
  result: R
}

export type ReadDirectory = (dir: string) => Promise<Dirent[]>

export interface UnreadableDirectory {
  /** Path relative to the input directory, with forward slashes */
  relativePath: string
  error: FileProcessingError
}

export interface Discovery {
  /** Markdown files sorted by relative path */
  files: DiscoveredFile[]
  /** Subdirectories that could not be listed; their contents are skipped */
  unreadable: UnreadableDirectory[]
}

export type FileOperation<R> = (
  content: string,
  file: DiscoveredFile
) => FileOperationOutput<R> | Promise<FileOperationOutput<R>>

export interface ProcessDirectoryOptions<R> {
  inputDir: string
  outputDir?: string
  /** 0 = one worker per logical core */
  threads: number
  operation: FileOperation<R>
  /** Restricts the batch to the discovered files this returns true for */
  include?: (file: DiscoveredFile) => boolean
  readDirectory?: ReadDirectory
}

export interface FileResult<R> {
  file: DiscoveredFile
  result: R
}

export interface ProcessDirectoryResult<R> {
  summary: BatchSummary
  /** Successful files, sorted by relative path */
  results: Array<FileResult<R>>
}

function compareStrings(a: string, b: string): number {
  if (a === b) return 0
  return a < b ? -1 : 1
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory()
  } catch {
    return false
  }
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target)
    return true
  } catch {
    return false
  }
}

/**
 * Fails before any work when the input is not a directory or the output path
 * exists as something other than a directory. Creates a missing output dir.
 */
export async function prepareDirectories(inputDir: string, outputDir?: string): Promise<void> {
  if (!(await isDirectory(inputDir))) {
    throw new DirectoryError(inputDir, 'Input path is not a directory')
  }
  if (outputDir === undefined) return

  if (await pathExists(outputDir)) {
    if (!(await isDirectory(outputDir))) {
      throw new DirectoryError(outputDir, 'Output path exists but is not a directory')
    }
    return
  }

  try {
    await fs.mkdir(outputDir, { recursive: true })
  } catch (error) {
    throw new DirectoryError(outputDir, `Failed to create output directory (${toError(error).message})`)
  }
}

function listDirectory(dir: string): Promise<Dirent[]> {
  return fs.readdir(dir, { withFileTypes: true })
}

function toRelative(root: string, target: string): string {
  return path.relative(root, target).split(path.sep).join('/')
}

/**
 * Recursively lists `*.md` files under `rootDir`.
 *
 * A subdirectory that cannot be listed is recorded and skipped.
 *
 * @throws DirectoryError when `rootDir` itself cannot be listed
 */
export async function discoverMarkdownFiles(
  rootDir: string,
  readDirectory: ReadDirectory = listDirectory
): Promise<Discovery> {
  const root = path.resolve(rootDir)
  const files: DiscoveredFile[] = []
  const unreadable: UnreadableDirectory[] = []

  async function walk(dir: string): Promise<void> {
    let entries: Dirent[]
    try {
      entries = await readDirectory(dir)
    } catch (error) {
      if (dir === root) {
        throw new DirectoryError(rootDir, `Input directory cannot be listed (${toError(error).message})`)
      }
      const failure = new FileProcessingError(dir, 'read', toError(error))
      log.warn(`Skipping unreadable directory ${dir}: ${failure.originalError.message}`)
      unreadable.push({ relativePath: toRelative(root, dir), error: failure })
      return
    }

    for (const entry of entries) {
      const entryPath = path.join(dir, entry.name)
      if (entry.isDirectory()) {
        await walk(entryPath)
      } else if (entry.isFile() && path.extname(entry.name) === '.md') {
        files.push({ absolutePath: entryPath, relativePath: toRelative(root, entryPath) })
      }
    }
  }

  await walk(root)
  return {
    files: files.sort((a, b) => compareStrings(a.relativePath, b.relativePath)),
    unreadable: unreadable.sort((a, b) => compareStrings(a.relativePath, b.relativePath))
  }
}

/**
 * Reads a file as strict UTF-8.
 *
 * @throws FileProcessingError with stage 'read'
 */
export async function readTextFile(filePath: string): Promise<string> {
  try {
    const buffer = await fs.readFile(filePath)
    return utf8Decoder.decode(buffer)
  } catch (error) {
    throw new FileProcessingError(filePath, 'read', toError(error))
  }
}

async function writeOutput(outputDir: string, file: DiscoveredFile, content: string): Promise<void> {
  const target = path.join(outputDir, ...file.relativePath.split('/'))
  try {
    await fs.mkdir(path.dirname(target), { recursive: true })
    await fs.writeFile(target, content, 'utf8')
  } catch (error) {
    throw new FileProcessingError(target, 'write', toError(error))
  }
}

async function processFile<R>(
  file: DiscoveredFile,
  options: ProcessDirectoryOptions<R>
): Promise<R> {
  const content = await readTextFile(file.absolutePath)

  let output: FileOperationOutput<R>
  try {
    output = await options.operation(content, file)
  } catch (error) {
    throw new FileProcessingError(file.absolutePath, 'processing', toError(error))
  }

  if (options.outputDir !== undefined && output.content !== undefined) {
    await writeOutput(options.outputDir, file, output.content)
  }
  return output.result
}

/**
 * Runs `operation` over every markdown file in `inputDir`.
 *
 * @throws DirectoryError when the directories are unusable
 *
 * @example
 * const { summary, results } = await processDirectory({
 *   inputDir: './markdown',
 *   outputDir: './cleaned',
 *   threads: 0,
 *   operation: content => ({ content: cleanText(content, ['greek']), result: null })
 * })
 */
export async function processDirectory<R>(
  options: ProcessDirectoryOptions<R>
): Promise<ProcessDirectoryResult<R>> {
  await prepareDirectories(options.inputDir, options.outputDir)

  const discovery = await discoverMarkdownFiles(options.inputDir, options.readDirectory)
  const include = options.include
  const files = include ? discovery.files.filter(file => include(file)) : discovery.files

  // Unreadable directories count as read failures of the batch
  const skipped: BatchSummary['errors'] = discovery.unreadable.map(({ relativePath, error }) => ({
    file: relativePath,
    errorType: 'read' as const,
    message: error.message
  }))

  if (files.length === 0) {
    log.info(`No markdown files found in ${options.inputDir}`)
    return {
      summary: {
        status: 'empty',
        message: 'No markdown files found in input directory.',
        totalFilesFound: 0,
        filesProcessed: 0,
        filesWithErrors: skipped.length,
        errors: skipped
      },
      results: []
    }
  }

  const concurrency = resolveConcurrency(options.threads)
  log.info(`Processing ${files.length} markdown files with ${concurrency} workers`)
  const startTime = Date.now()

  const outcomes = await runPool(files, concurrency, file => processFile(file, options), {
    onProgress: (completed, total) => {
      if (completed % 100 === 0 || completed === total) {
        log.debug(`${completed}/${total} files done`)
      }
    }
  })

  const results: Array<FileResult<R>> = []
  const errors: BatchSummary['errors'] = [...skipped]

  outcomes.forEach((outcome, index) => {
    const file = files[index]
    if (outcome.status === 'fulfilled') {
      results.push({ file, result: outcome.value })
      return
    }
    log.warn(`Failed ${file.relativePath}: ${outcome.reason.message}`)
    errors.push({
      file: file.relativePath,
      errorType: classifyFileError(outcome.reason),
      message: outcome.reason.message
    })
  })

  const elapsed = Date.now() - startTime
  log.info(`Completed ${results.length}/${files.length} files in ${elapsed}ms (${errors.length} errors)`)

  return {
    summary: {
      status: 'completed',
      message: `Operation completed on ${results.length} files. Errors on ${errors.length} files.`,
      totalFilesFound: files.length,
      filesProcessed: results.length,
      filesWithErrors: errors.length,
      errors
    },
    results
  }
}
