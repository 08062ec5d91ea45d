import fs from 'fs-extra'
import * as path from 'path'

/**
 * File Operations Utilities
 *
 * All-or-nothing writes: content goes to a temporary file beside the
 * target and is renamed over it. Created files are tracked in a
 * transaction so a failed write leaves nothing behind.
 */

// ============================================================================
// Custom Errors
// ============================================================================

/**
 * Error thrown when the manifest cannot be written
 */
export class ManifestWriteError extends Error {
  constructor(
    message: string,
    public readonly targetPath: string,
    public readonly cause?: Error
  ) {
    super(message)
    this.name = 'ManifestWriteError'
  }
}

function getErrorCode(error: unknown): string {
  if (error instanceof Error && 'code' in error) {
    return String(error.code)
  }
  return 'UNKNOWN'
}

function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

// ============================================================================
// Transaction Tracking
// ============================================================================

/**
 * Operation types for transaction tracking
 */
export enum OperationType {
  CREATE_FILE = 'create_file',
}

/**
 * A tracked operation for rollback
 */
export interface Operation {
  type: OperationType
  path: string
}

/**
 * Result of a rollback operation
 */
export interface RollbackResult {
  /** Operations that were successfully rolled back */
  rolledBackOperations: Operation[]
  /** Operations that failed to rollback */
  failedRollbacks: Array<{ operation: Operation; error: string }>
}

/**
 * Transaction for tracking file operations
 *
 * Enables rollback of all operations if any step fails.
 */
export class FileOperationTransaction {
  private operations: Operation[] = []
  private onWarning?: (message: string) => void

  /**
   * @param onWarning - Callback for warning messages during rollback
   */
  constructor(onWarning?: (message: string) => void) {
    this.onWarning = onWarning
  }

  record(type: OperationType, filePath: string): void {
    this.operations.push({ type, path: filePath })
  }

  /**
   * Forget an operation that no longer needs undoing (e.g. a temp file that was renamed)
   */
  release(filePath: string): void {
    this.operations = this.operations.filter((op) => op.path !== filePath)
  }

  getOperations(): Operation[] {
    return [...this.operations]
  }

  /**
   * Rollback all operations in reverse order
   */
  async rollback(): Promise<RollbackResult> {
    const rolledBackOperations: Operation[] = []
    const failedRollbacks: Array<{ operation: Operation; error: string }> = []

    for (const op of [...this.operations].reverse()) {
      try {
        switch (op.type) {
          case OperationType.CREATE_FILE:
            if (await fs.pathExists(op.path)) {
              await fs.remove(op.path)
              rolledBackOperations.push(op)
            }
            break
        }
      } catch (error) {
        // Report error but continue rolling back other operations
        const errMsg = getErrorMessage(error)
        failedRollbacks.push({ operation: op, error: errMsg })
        this.onWarning?.(`Failed to rollback operation ${op.type} at ${op.path}: ${errMsg}`)
      }
    }

    this.clear()
    return { rolledBackOperations, failedRollbacks }
  }

  clear(): void {
    this.operations = []
  }
}

// ============================================================================
// Atomic Writes
// ============================================================================

export interface WriteFileAtomicOptions {
  /** Called for problems that do not fail the write, such as an undeletable temp file */
  onWarning?: (message: string) => void
}

/**
 * Temporary file name beside the target
 */
export function temporaryPathFor(targetPath: string): string {
  const dir = path.dirname(targetPath)
  const base = path.basename(targetPath)
  return path.join(dir, `.${base}.${process.pid}.${Date.now()}.tmp`)
}

/**
 * Permission bits of an existing file, or undefined when there is none
 */
async function existingMode(filePath: string): Promise<number | undefined> {
  try {
    return (await fs.stat(filePath)).mode & 0o7777
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') {
      return undefined
    }
    throw error
  }
}

/**
 * Write a file so that readers see either the old or the new contents
 *
 * The parent directory must already exist. A replaced file keeps its
 * permissions; a new one is created as 0644 (less the umask).
 *
 * @throws {ManifestWriteError} If the file cannot be written; the previous file is left untouched
 */
export async function writeFileAtomic(
  targetPath: string,
  contents: string,
  options: WriteFileAtomicOptions = {}
): Promise<void> {
  const parentDir = path.dirname(targetPath)
  if (!(await fs.pathExists(parentDir))) {
    throw new ManifestWriteError(`Output directory does not exist: ${parentDir}`, targetPath)
  }

  const transaction = new FileOperationTransaction(options.onWarning)
  const tempPath = temporaryPathFor(targetPath)

  try {
    const mode = await existingMode(targetPath)
    transaction.record(OperationType.CREATE_FILE, tempPath)
    await fs.writeFile(tempPath, contents, { encoding: 'utf8', flag: 'wx', mode: mode ?? 0o644 })
    if (mode !== undefined) {
      await fs.chmod(tempPath, mode)
    }
    await fs.rename(tempPath, targetPath)
    transaction.release(tempPath)
  } catch (error) {
    await transaction.rollback()
    throw new ManifestWriteError(
      `Cannot write ${targetPath} (${getErrorCode(error)}): ${getErrorMessage(error)}`,
      targetPath,
      error instanceof Error ? error : undefined
    )
  }
}

/**
 * Read a text file, or undefined when it does not exist
 */
export async function readFileIfExists(filePath: string): Promise<string | undefined> {
  try {
    return await fs.readFile(filePath, 'utf8')
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') {
      return undefined
    }
    throw error
  }
}
