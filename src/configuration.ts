/**
 * Global configuration for the vnlaunch CLI
 *
 * Centralizes environment variables, paths and the version string.
 * Environment files should be loaded using Node's --env-file flag
 */

import { homedir } from 'node:os'
import { join } from 'node:path'
import packageJson from '../package.json'

class Configuration {
  public readonly programName: string
  public readonly currentCliVersion: string

  // Directories and paths
  public readonly homeDir: string
  public readonly logsDir: string

  public readonly isDebug: boolean

  constructor() {
    this.programName = 'vnlaunch'
    this.currentCliVersion = packageJson.version

    // Directory configuration - Priority: VNLAUNCH_HOME_DIR env > default home dir
    if (process.env.VNLAUNCH_HOME_DIR) {
      this.homeDir = process.env.VNLAUNCH_HOME_DIR.replace(/^~(?=\/|$)/, homedir())
    } else {
      this.homeDir = join(homedir(), '.vnlaunch')
    }

    this.logsDir = join(this.homeDir, 'logs')

    this.isDebug = ['true', '1', 'yes'].includes(process.env.DEBUG?.toLowerCase() || '')
  }
}

export const configuration: Configuration = new Configuration()
