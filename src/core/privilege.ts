import { CommandRunner } from './command.js'
import { ConvergeError } from './errors.js'
import { CommandOutput, PrivilegeSession } from '../types.js'

export type Printer = (line: string) => void

/**
 * A cached sudo credential, valid from `acquire` until `release`.
 */
export class PrivilegeContext implements PrivilegeSession {
  private live = true

  private constructor(private readonly runner: CommandRunner) {}

  /**
   * Print why elevation is needed, then let sudo prompt on the terminal.
   */
  static async acquire(reason: string, runner: CommandRunner, out: Printer = () => {}): Promise<PrivilegeContext> {
    out(reason)
    const code = await runner.interactive('sudo', ['-v'])
    if (code !== 0) throw new ConvergeError({ kind: 'privilege_denied' })
    return new PrivilegeContext(runner)
  }

  /**
   * Non-interactive check of the cached credential.
   */
  static async isValid(runner: CommandRunner): Promise<boolean> {
    try {
      const res = await runner.run('sudo', ['-n', 'true'])
      return res.code === 0
    } catch (e) {
      if (e instanceof ConvergeError && e.kind === 'tool_missing') return false
      throw e
    }
  }

  get valid(): boolean {
    return this.live
  }

  async run(cmd: string, args: readonly string[]): Promise<CommandOutput> {
    if (!this.live) throw new ConvergeError({ kind: 'not_validated' })
    return this.runner.run('sudo', ['-n', cmd, ...args])
  }

  async release(): Promise<void> {
    if (!this.live) return
    this.live = false
    await this.runner.run('sudo', ['-k'])
  }
}

const RELEASE_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM']

/**
 * Run `fn` with `session`, releasing it on every exit path. An interrupt while the
 * scope is open releases the session before the signal is re-raised.
 */
export async function withPrivilege<T>(session: PrivilegeSession, fn: (session: PrivilegeSession) => Promise<T>): Promise<T> {
  const onSignal = (signal: NodeJS.Signals) => {
    removeListeners()
    const reraise = () => { process.kill(process.pid, signal) }
    void session.release().then(reraise, reraise)
  }
  const removeListeners = () => {
    for (const s of RELEASE_SIGNALS) process.removeListener(s, onSignal)
  }
  for (const s of RELEASE_SIGNALS) process.on(s, onSignal)

  try {
    return await fn(session)
  } finally {
    removeListeners()
    await session.release()
  }
}
