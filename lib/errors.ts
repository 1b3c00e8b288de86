/**
 * Structured error types for cleaning and batch processing.
 */

/**
 * Thrown when a caller asks for script keys the registry does not know.
 * Cleaning and analysis both reject unknown keys instead of ignoring them.
 */
export class UnknownScriptError extends Error {
  constructor(
    public unknownKeys: string[],
    public availableKeys: string[]
  ) {
    super(
      `UNKNOWN_SCRIPT: ${unknownKeys.join(', ')} (available: ${availableKeys.join(', ')})`
    )
    this.name = 'UnknownScriptError'
  }
}

/**
 * Thrown when batch options fail schema validation.
 */
export class InvalidOptionsError extends Error {
  constructor(public issues: string[]) {
    super(`INVALID_OPTIONS: ${issues.join('; ')}`)
    this.name = 'InvalidOptionsError'
  }
}

/**
 * Thrown before any file is touched when the input or output directory is
 * unusable. Fatal for the whole batch.
 */
export class DirectoryError extends Error {
  constructor(
    public path: string,
    public reason: string
  ) {
    super(`DIRECTORY_ERROR: ${reason}: ${path}`)
    this.name = 'DirectoryError'
  }
}

/**
 * Failure of a single file inside a batch. Never fatal for the batch.
 */
export class FileProcessingError extends Error {
  constructor(
    public filePath: string,
    public stage: FileErrorType,
    public originalError: Error
  ) {
    super(`FILE_${stage.toUpperCase()}_FAILED: ${filePath}: ${originalError.message}`)
    this.name = 'FileProcessingError'
    this.cause = originalError
  }
}

export type FileErrorType = 'read' | 'write' | 'processing'

/**
 * Normalizes anything thrown into an Error.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value
  return new Error(String(value))
}

/**
 * Classifies a per-file failure so batch summaries can group them.
 *
 * @example
 * classifyFileError(new FileProcessingError('a.md', 'read', err)) // 'read'
 * classifyFileError(new Error('EACCES: permission denied, open ...')) // 'read'
 */
export function classifyFileError(error: Error): FileErrorType {
  if (error instanceof FileProcessingError) {
    return error.stage
  }

  const message = error.message
  if (message.startsWith('ENOENT') ||
      message.startsWith('EACCES') ||
      message.startsWith('EISDIR') ||
      message.includes('invalid UTF-8')) {
    return 'read'
  }
  if (message.startsWith('ENOSPC') ||
      message.startsWith('EROFS') ||
      message.startsWith('ENOTDIR')) {
    return 'write'
  }
  return 'processing'
}

/**
 * Gets a short operator-facing message with a hint for the error type.
 */
export function getUserFriendlyError(error: Error): string {
  if (error instanceof UnknownScriptError) {
    return `${error.message}. Run the "scripts" command to list valid keys.`
  }
  if (error instanceof DirectoryError) {
    return `${error.message}. Check the path and its permissions.`
  }
  if (error instanceof InvalidOptionsError) {
    return error.message
  }

  switch (classifyFileError(error)) {
    case 'read':
      return `${error.message}. The file could not be read as UTF-8 text.`
    case 'write':
      return `${error.message}. The output location is not writable.`
    default:
      return `Processing error: ${error.message}`
  }
}
