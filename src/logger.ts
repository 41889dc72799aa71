import chalk from 'chalk'

export type Logger = {
  info: (message: string) => void
  step: (message: string) => void
  success: (message: string) => void
  warn: (message: string) => void
  error: (message: string) => void
  debug: (message: string) => void
}

export type LoggerOptions = {
  verbose?: boolean
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { verbose = false } = options

  return {
    info: (message) => console.log(message),
    step: (message) => console.log(`\n${chalk.cyan('▶')} ${message}`),
    success: (message) => console.log(`${chalk.green('✓')} ${message}`),
    warn: (message) => console.log(`${chalk.yellow('⚠')} ${message}`),
    error: (message) => console.error(`${chalk.red('✗')} ${message}`),
    debug: (message) => {
      if (verbose) {
        console.log(chalk.dim(message))
      }
    },
  }
}
