import { Logger } from '../types.js'
import { TextSink } from './progress.js'
import { t } from './theme.js'

/**
 * Diagnostics go to stderr; `info` only when verbose.
 */
export function createCliLogger(sink: TextSink, verbose: boolean): Logger {
  return {
    info(msg) {
      if (verbose) sink.write(`${t.dim(msg)}\n`)
    },
    warn(msg) {
      sink.write(`${t.amber(msg)}\n`)
    },
    error(msg) {
      sink.write(`${t.red(msg)}\n`)
    },
  }
}
