/**
 * File-backed debug logger
 *
 * Debug lines go to a per-process file under the logs directory so they never
 * interleave with command output. Set DEBUG=1 to mirror them on stderr.
 */

import { appendFileSync, mkdirSync } from 'node:fs'
import { join } from 'node:path'
import { inspect } from 'node:util'

import chalk from 'chalk'

import { configuration } from '@/configuration'

const MAX_JSON_LENGTH = 1000

function formatArgs(args: unknown[]): string {
  if (args.length === 0) return ''
  return ' ' + args.map((arg) => (typeof arg === 'string' ? arg : inspect(arg, { depth: 4, breakLength: Infinity }))).join(' ')
}

class Logger {
  private readonly logFilePath: string
  private directoryReady = false
  private fileLoggingDisabled = false

  constructor(
    private readonly logsDir: string,
    private readonly echoDebug: boolean,
  ) {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-')
    this.logFilePath = join(logsDir, `${timestamp}-pid-${process.pid}.log`)
  }

  debug(message: string, ...args: unknown[]): void {
    const line = `${message}${formatArgs(args)}`
    this.writeToFile('DEBUG', line)
    if (this.echoDebug) {
      console.error(chalk.gray(`[debug] ${line}`))
    }
  }

  debugLargeJson(message: string, value: unknown): void {
    const json = JSON.stringify(value) ?? 'undefined'
    const truncated = json.length > MAX_JSON_LENGTH
      ? `${json.slice(0, MAX_JSON_LENGTH)}... (${json.length - MAX_JSON_LENGTH} more chars)`
      : json
    this.debug(message, truncated)
  }

  info(message: string, ...args: unknown[]): void {
    const line = `${message}${formatArgs(args)}`
    this.writeToFile('INFO', line)
    console.log(line)
  }

  warn(message: string, ...args: unknown[]): void {
    const line = `${message}${formatArgs(args)}`
    this.writeToFile('WARN', line)
    console.error(chalk.yellow(line))
  }

  getLogPath(): string {
    return this.logFilePath
  }

  private writeToFile(level: string, line: string): void {
    if (this.fileLoggingDisabled) return
    try {
      if (!this.directoryReady) {
        mkdirSync(this.logsDir, { recursive: true })
        this.directoryReady = true
      }
      appendFileSync(this.logFilePath, `[${new Date().toISOString()}] ${level} ${line}\n`)
    } catch (error) {
      this.fileLoggingDisabled = true
      console.error(chalk.red('Failed to write log file:'), error instanceof Error ? error.message : String(error))
    }
  }
}

export const logger = new Logger(configuration.logsDir, configuration.isDebug)
