import { spawn } from 'node:child_process'

import { ConvergeError } from './errors.js'
import { CommandOutput } from '../types.js'

export interface CommandRunner {
  /**
   * Run to completion with stdout/stderr captured. Rejects only when the tool cannot be started.
   */
  run(cmd: string, args: readonly string[]): Promise<CommandOutput>
  /**
   * Run with inherited stdio (for prompts) and resolve with the exit code.
   */
  interactive(cmd: string, args: readonly string[]): Promise<number>
}

function isMissingTool(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT'
}

function spawnError(cmd: string, err: Error): Error {
  if (isMissingTool(err)) return new ConvergeError({ kind: 'tool_missing', tool: cmd })
  return err
}

export function commandLine(cmd: string, args: readonly string[]): string {
  return [cmd, ...args].join(' ')
}

export const nodeRunner: CommandRunner = {
  run(cmd, args) {
    return new Promise((resolve, reject) => {
      const child = spawn(cmd, [...args], { stdio: ['ignore', 'pipe', 'pipe'] })

      const stdoutChunks: Buffer[] = []
      const stderrChunks: Buffer[] = []

      child.stdout.on('data', (chunk: Buffer) => { stdoutChunks.push(chunk) })
      child.stderr.on('data', (chunk: Buffer) => { stderrChunks.push(chunk) })

      // 'close' fires after both pipes are drained.
      child.on('close', (code: number | null) => {
        resolve({
          code: code ?? 1,
          stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
          stderr: Buffer.concat(stderrChunks).toString('utf-8'),
        })
      })

      child.on('error', (err: Error) => { reject(spawnError(cmd, err)) })
    })
  },

  interactive(cmd, args) {
    return new Promise((resolve, reject) => {
      const child = spawn(cmd, [...args], { stdio: 'inherit' })
      child.on('close', (code: number | null) => { resolve(code ?? 1) })
      child.on('error', (err: Error) => { reject(spawnError(cmd, err)) })
    })
  },
}
