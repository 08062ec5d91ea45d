import type { Command } from '@oclif/core'

/**
 * Error Helper Utility
 *
 * Centralized error output for pbxforge commands, with stack trace
 * control and JSON output support.
 *
 * - `validation()` for expected user errors (bad configuration, existing file)
 * - `operation()` for runtime failures (missing directories, permissions)
 * - `unexpected()` for internal errors that should show a stack trace
 *
 * @example
 * try {
 *   await writeProject(project)
 * } catch (error) {
 *   ErrorHelper.operation(this, toError(error), 'Failed to write manifest', flags.json)
 * }
 */
export class ErrorHelper {
  /**
   * Handle validation errors (user input, preconditions)
   *
   * Clean message, no stack trace.
   *
   * @returns Never returns (exits process)
   */
  static validation(command: Command, message: string, json?: boolean): never {
    if (json) {
      command.log(JSON.stringify({ status: 'error', error: message }, null, 2))
      command.exit(1)
    } else {
      // Use { exit: false } to prevent stack trace display
      command.error(message, { exit: false })
      command.exit(1)
    }
  }

  /**
   * Handle operation errors (runtime failures)
   *
   * @param context - What was being attempted, prefixed to the message
   * @returns Never returns (exits process)
   */
  static operation(command: Command, error: Error, context: string, json?: boolean): never {
    const message = `${context}: ${error.message}`

    if (json) {
      command.log(
        JSON.stringify(
          {
            status: 'error',
            error: message,
            context,
            details: error.message,
          },
          null,
          2
        )
      )
      command.exit(1)
    } else {
      command.error(message, { exit: false })
      command.exit(1)
    }
  }

  /**
   * Handle unexpected errors (bugs)
   *
   * @returns Never returns (exits process with stack trace)
   */
  static unexpected(command: Command, error: Error): never {
    // Let oclif display the full stack trace
    command.error(error.message)
  }

  /**
   * Warn the user without exiting
   */
  static warn(command: Command, message: string, json?: boolean): void {
    if (json) {
      command.log(JSON.stringify({ status: 'warning', warning: message }, null, 2))
    } else {
      command.warn(message)
    }
  }
}

/**
 * Normalize a caught value to an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}
