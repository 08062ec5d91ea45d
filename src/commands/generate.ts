import { Command, Flags } from '@oclif/core'
import * as path from 'path'
import { ConfigError, loadConfig } from '../config/loader.js'
import { DiscoveryError } from '../manifest/discovery.js'
import type { GeneratedProject } from '../manifest/generator.js'
import { generateProject, isProjectUpToDate, writeProject } from '../manifest/generator.js'
import { IdentifierCollisionError } from '../manifest/identifiers.js'
import { baseArg, jsonFlag, resolveBaseDir } from '../utils/common-flags.js'
import { ErrorHelper, toError } from '../utils/errors.js'
import { ManifestWriteError } from '../utils/fileOps.js'

type Spinner = Awaited<ReturnType<typeof import('ora').default>>
type Chalk = Awaited<typeof import('chalk').default>

/**
 * Generate the project manifest
 *
 * Scans the source directory and rewrites project.pbxproj from scratch.
 */
export default class Generate extends Command {
  static description = 'Generate project.pbxproj from the source files under a project directory'

  static examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> ./MyApp',
    '<%= config.bin %> <%= command.id %> --dry-run',
    '<%= config.bin %> <%= command.id %> --check --json',
  ]

  static args = {
    base: baseArg,
  }

  static flags = {
    'dry-run': Flags.boolean({
      char: 'n',
      description: 'Print the manifest instead of writing it',
      default: false,
      exclusive: ['check'],
    }),
    check: Flags.boolean({
      char: 'c',
      description: 'Exit with status 1 when the manifest on disk is out of date',
      default: false,
      exclusive: ['dry-run'],
    }),
    json: jsonFlag,
  }

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Generate)
    const baseDir = resolveBaseDir(args.base)
    const { spinner, chalk } = await this.initializeUI(flags.json)

    spinner?.start('Loading configuration...')
    const project = await this.generate(baseDir, spinner).catch((error: unknown) =>
      this.handleError(error, flags.json, spinner)
    )
    const output = path.relative(baseDir, project.outputPath) || project.outputPath
    const files = project.files.map((file) => file.relativePath)

    if (flags['dry-run']) {
      spinner?.stop()
      if (flags.json) {
        this.log(
          JSON.stringify(
            { status: 'success', output, files, written: false, contents: project.contents },
            null,
            2
          )
        )
      } else {
        this.log(project.contents.replace(/\n$/, ''))
      }
      return
    }

    if (flags.check) {
      const upToDate = await isProjectUpToDate(project).catch((error: unknown) =>
        this.handleError(error, flags.json, spinner)
      )
      spinner?.stop()
      if (!upToDate) {
        ErrorHelper.validation(
          this,
          `${output} is out of date; run \`${this.config.bin} generate\` to update it`,
          flags.json
        )
      }
      if (flags.json) {
        this.log(JSON.stringify({ status: 'success', output, files, upToDate: true }, null, 2))
      } else {
        this.log(`${this.tick(chalk)} ${output} is up to date`)
      }
      return
    }

    if (spinner) {
      spinner.text = `Writing ${output}...`
    }
    await writeProject(project, (message) => ErrorHelper.warn(this, message, flags.json)).catch(
      (error: unknown) => this.handleError(error, flags.json, spinner)
    )
    spinner?.stop()

    if (flags.json) {
      this.log(JSON.stringify({ status: 'success', output, files, written: true }, null, 2))
    } else {
      this.log(`${this.tick(chalk)} Generated ${output} with ${files.length} source file(s)`)
    }
  }

  /**
   * Initialize UI components (spinner and chalk); both are skipped in JSON mode
   */
  private async initializeUI(isJson: boolean): Promise<{ spinner: Spinner | null; chalk: Chalk | null }> {
    const ora = !isJson ? (await import('ora')).default : null
    const spinner = ora ? ora() : null
    const chalk = !isJson ? (await import('chalk')).default : null

    return { spinner, chalk }
  }

  private async generate(baseDir: string, spinner: Spinner | null): Promise<GeneratedProject> {
    const config = await loadConfig({ baseDir })
    if (spinner) {
      spinner.text = `Scanning ${config.sources.directory}...`
    }
    return generateProject({ baseDir, config })
  }

  private tick(chalk: Chalk | null): string {
    return chalk ? chalk.green('✓') : '✓'
  }

  /**
   * Report a failure and exit
   */
  private handleError(error: unknown, json: boolean, spinner: Spinner | null): never {
    spinner?.fail('Failed')

    if (error instanceof ConfigError) {
      ErrorHelper.validation(this, error.message, json)
    }
    if (error instanceof DiscoveryError) {
      ErrorHelper.operation(this, error, 'Failed to discover source files', json)
    }
    if (error instanceof IdentifierCollisionError) {
      ErrorHelper.operation(this, error, 'Failed to build manifest', json)
    }
    if (error instanceof ManifestWriteError) {
      ErrorHelper.operation(this, error, 'Failed to write manifest', json)
    }
    ErrorHelper.unexpected(this, toError(error))
  }
}
