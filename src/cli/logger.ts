/**
 * CLI Logger
 *
 * Progress reporting and logging utilities for the CLI.
 */

export interface Logger {
  log: (msg: string) => void
  verbose: (msg: string) => void
  success: (msg: string) => void
  warn: (msg: string) => void
  error: (msg: string) => void
  progress: (msg: string, current: number, total: number) => void
}

/**
 * Render a 40-cell progress bar for a percentage (clamped to 0-100).
 */
export function renderBar(pct: number): string {
  const filled = Math.round(Math.min(100, Math.max(0, pct)) / 2.5)
  return '█'.repeat(filled) + '░'.repeat(40 - filled)
}

/**
 * Logger for runs that write data to stdout: everything goes to stderr so
 * the data stream stays clean.
 */
export function createLogger(quiet: boolean, verbose: boolean, toStderr = false): Logger {
  const out = toStderr ? console.error : console.log
  const stream = toStderr ? process.stderr : process.stdout

  return {
    log: (msg: string) => {
      if (!quiet) out(msg)
    },
    verbose: (msg: string) => {
      if (verbose) out(`  [debug] ${msg}`)
    },
    success: (msg: string) => {
      if (!quiet) out(`  ✓ ${msg}`)
    },
    warn: (msg: string) => {
      if (!quiet) console.error(`  ! ${msg}`)
    },
    error: (msg: string) => {
      console.error(`  ✗ ${msg}`)
    },
    progress: (msg: string, current: number, total: number) => {
      if (!quiet) {
        const pct = total === 0 ? 100 : Math.round((current / total) * 100)
        stream.write(`\r  [${renderBar(pct)}] ${pct}% ${msg}`)
        if (current >= total) {
          stream.write('\n')
        }
      }
    }
  }
}
