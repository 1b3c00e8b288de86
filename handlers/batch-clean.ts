/**
 * Batch cleaning handler.
 *
 * Cleans every markdown file under the input directory and writes the result
 * to the same relative path under the output directory.
 */

import {
  BatchCleanOptionsSchema,
  parseOptions,
  type BatchCleanOptions,
  type BatchSummary
} from '../types/job-schemas.js'
import { processDirectory } from '../lib/directory-processor.js'
import { buildAllowedCharSet } from '../lib/text-analysis.js'
import { cleanDocument } from '../lib/document-cleaner.js'
import { unusualChars } from '../lib/script-registry.js'
import { createLogger } from '../lib/logger.js'

const log = createLogger('BatchClean')

/**
 * @throws UnknownScriptError / InvalidOptionsError / DirectoryError before any file is read
 *
 * @example
 * const summary = await batchCleanMarkdownFiles({
 *   inputDir: './markdown',
 *   outputDir: './cleaned',
 *   scripts: ['greek', 'latin'],
 *   threads: 0
 * })
 * console.log(`${summary.filesProcessed} cleaned, ${summary.filesWithErrors} failed`)
 */
export async function batchCleanMarkdownFiles(input: BatchCleanOptions): Promise<BatchSummary> {
  const options = parseOptions(BatchCleanOptionsSchema, input)

  // One allow-list for the whole batch; it is only ever read
  const allowed = buildAllowedCharSet(options.scripts)
  const unusual = unusualChars()

  log.info(`Cleaning ${options.inputDir} -> ${options.outputDir} (scripts: ${options.scripts.join(', ')})`)

  const { summary } = await processDirectory({
    inputDir: options.inputDir,
    outputDir: options.outputDir,
    threads: options.threads,
    operation: content => ({
      content: cleanDocument(content, allowed, unusual),
      result: null
    })
  })

  return summary
}
