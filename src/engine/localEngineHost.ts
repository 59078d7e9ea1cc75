/**
 * Engine host used by the vnlaunch binary
 *
 * Script loading, rendering and the game loop belong to the engine proper; this
 * host covers what the launcher can do on its own: settings, a project layout
 * lint and persistent-data removal.
 */

import { existsSync, readdirSync, statSync, unlinkSync } from 'node:fs'
import { join, resolve } from 'node:path'

import chalk from 'chalk'

import type { LaunchArgs } from '@/cli/launchArgs'
import type { LaunchSession } from '@/cli/session'
import { configuration } from '@/configuration'
import { logger } from '@/ui/logger'

import type { EngineHost, EngineSettings, StartOutcome } from './types'

export const SCRIPT_EXTENSION = '.rpy'

export function resolveBasedir(args: LaunchArgs): string {
  return resolve(args.basedir || '.')
}

export function persistentFilePath(args: LaunchArgs): string {
  const saveDir = args.savedir ?? join(resolveBasedir(args), 'game', 'saves')
  return join(saveDir, 'persistent')
}

/**
 * Checks that the project has a game directory with at least one script in it.
 * Returns the problems found, empty when there are none.
 */
export function lintProjectLayout(basedir: string): string[] {
  if (!existsSync(basedir) || !statSync(basedir).isDirectory()) {
    return [`Base directory ${basedir} does not exist.`]
  }

  const gameDir = join(basedir, 'game')
  if (!existsSync(gameDir) || !statSync(gameDir).isDirectory()) {
    return [`Base directory ${basedir} has no game directory.`]
  }

  const scripts = readdirSync(gameDir, { recursive: true, encoding: 'utf8' })
    .filter((entry) => entry.endsWith(SCRIPT_EXTENSION))
  if (scripts.length === 0) {
    return [`The game directory contains no ${SCRIPT_EXTENSION} scripts.`]
  }

  return []
}

export class LocalEngineHost implements EngineHost {
  public readonly version: string
  private settings: EngineSettings = {
    profileDisplay: false,
    debugImageCache: false,
    warpSpec: null,
    savePersistent: true,
  }

  constructor(version: string) {
    this.version = version
  }

  getSettings(): Readonly<EngineSettings> {
    return this.settings
  }

  updateSettings(patch: Partial<EngineSettings>): void {
    this.settings = { ...this.settings, ...patch }
    logger.debug('[engine] Settings updated:', patch)
  }

  runLint(args: LaunchArgs): void {
    const problems = lintProjectLayout(resolveBasedir(args))

    if (problems.length === 0) {
      logger.info(chalk.green('No problems were found.'))
      return
    }

    logger.info(chalk.red(`${problems.length} problem(s) found:`))
    for (const problem of problems) {
      logger.info(`  - ${problem}`)
    }
    if (args.extras.errorCode === true) {
      process.exitCode = 1
    }
  }

  unlinkPersistent(args: LaunchArgs): void {
    const path = persistentFilePath(args)
    if (existsSync(path)) {
      unlinkSync(path)
      logger.debug(`[engine] Deleted persistent data at ${path}`)
    } else {
      logger.warn(`No persistent data to remove at ${path}`)
    }
  }

  start(args: LaunchArgs, session: LaunchSession): StartOutcome {
    logger.debug('[engine] Starting with settings:', this.settings, 'reload:', session.reload)
    logger.info(chalk.blue(`Starting ${resolveBasedir(args)}${args.compile ? ' (compiling scripts)' : ''}${args.safeMode ? ' in safe mode' : ''}`))
    return { kind: 'quit', exitCode: 0 }
  }
}

export function createLocalEngineHost(): LocalEngineHost {
  return new LocalEngineHost(configuration.currentCliVersion)
}
