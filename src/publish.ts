import { execFile } from 'node:child_process'
import { promisify } from 'node:util'
import { getErrorMessage, PublishError } from './errors.js'
import type { Logger } from './logger.js'

const execFileAsync = promisify(execFile)

export type CommandResult = {
  stdout: string
  stderr: string
}

export type CommandRunner = (
  command: string,
  args: string[],
  options: { env: NodeJS.ProcessEnv },
) => Promise<CommandResult>

export const runCommand: CommandRunner = async (command, args, options) => {
  const { stdout, stderr } = await execFileAsync(command, args, {
    env: options.env,
  })
  return { stdout, stderr }
}

export type ReleaseToPublish = {
  tag: string
  files: string[]
  notes: string
}

export type PublishOptions = {
  release: ReleaseToPublish
  token: string | null
  repo?: string
  env?: NodeJS.ProcessEnv
  runner?: CommandRunner
  logger: Logger
}

export type PublishResult =
  | { status: 'published'; tag: string; url: string | null }
  | { status: 'skipped'; tag: string; command: string[] }

export function buildReleaseCommand(options: {
  release: ReleaseToPublish
  repo?: string
}): string[] {
  const { release, repo } = options
  const args = [
    'release',
    'create',
    release.tag,
    ...release.files,
    '--title',
    release.tag,
    '--notes',
    release.notes,
  ]
  if (repo) {
    args.push('--repo', repo)
  }
  return args
}

/**
 * Creates a GitHub release through the `gh` CLI. Without a token the command
 * is only reported.
 */
export async function publishRelease(
  options: PublishOptions,
): Promise<PublishResult> {
  const { release, token, repo, env = {}, runner = runCommand, logger } = options
  const args = buildReleaseCommand({ release, repo })

  if (!token) {
    logger.warn(
      `GITHUB_TOKEN not set, skipping release ${release.tag}. Would run: gh ${args.map(quoteArg).join(' ')}`,
    )
    return { status: 'skipped', tag: release.tag, command: ['gh', ...args] }
  }

  logger.info(`Creating release ${release.tag}...`)
  let result: CommandResult
  try {
    result = await runner('gh', args, { env: { ...env, GH_TOKEN: token } })
  } catch (error) {
    throw new PublishError(
      `Failed to create release ${release.tag}: ${getErrorMessage(error)}`,
      { cause: error },
    )
  }

  const url = result.stdout.trim() || null
  logger.success(`Published ${release.tag}${url ? ` (${url})` : ''}`)
  return { status: 'published', tag: release.tag, url }
}

function quoteArg(arg: string): string {
  return /^[\w./:@=+-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`
}
