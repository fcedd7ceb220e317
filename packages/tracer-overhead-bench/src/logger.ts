import chalk from 'chalk'
import type { Logger } from './types.js'

export function createConsoleLogger(options: { verbose?: boolean } = {}): Logger {
  const { verbose = false } = options

  return {
    info: (message, ...details) => console.log(message, ...details),
    warn: (message, ...details) => console.warn(chalk.yellow(`⚠️  ${message}`), ...details),
    error: (message, ...details) => console.error(chalk.red(`❌ ${message}`), ...details),
    debug: (message, ...details) => {
      if (verbose) {
        console.log(chalk.gray(message), ...details)
      }
    }
  }
}

export const consoleLogger: Logger = createConsoleLogger()

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {}
}
