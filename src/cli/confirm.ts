import { createInterface } from 'node:readline/promises'

import { Confirmer } from '../core/executor.js'

export const autoConfirm: Confirmer = { confirm: async () => true }

/**
 * y/N prompt on the given streams; anything but `y`/`yes` declines.
 */
export function promptConfirmer(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout): Confirmer {
  return {
    async confirm(prompt: string): Promise<boolean> {
      const rl = createInterface({ input, output })
      try {
        const answer = await rl.question(`${prompt} [y/N] `)
        const a = answer.trim().toLowerCase()
        return a === 'y' || a === 'yes'
      } finally {
        rl.close()
      }
    },
  }
}
