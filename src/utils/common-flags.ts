import { Args, Flags } from '@oclif/core'
import * as path from 'path'
import { getBaseDirFromEnv } from '../config/env.js'

/**
 * Common CLI flags and arguments shared across commands
 */

/**
 * JSON output flag
 * Enables structured JSON output instead of human-readable format
 */
export const jsonFlag = Flags.boolean({
  char: 'j',
  description: 'Output result in JSON format',
  default: false,
})

/**
 * Optional project base directory argument
 */
export const baseArg = Args.string({
  description: 'Project base directory (defaults to $PBXFORGE_BASE_DIR, then the current directory)',
  required: false,
})

/**
 * Resolve the base directory: argument, then PBXFORGE_BASE_DIR, then cwd
 */
export function resolveBaseDir(
  arg: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): string {
  return path.resolve(cwd, arg ?? getBaseDirFromEnv(env) ?? '.')
}
