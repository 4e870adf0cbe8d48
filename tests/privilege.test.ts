import { describe, expect, it } from 'vitest'

import { PrivilegeContext, withPrivilege } from '../src/core/privilege.js'
import { FakeRunner, FakeSession, fail, ok } from './helpers/fakes.js'

describe('PrivilegeContext', () => {
  it('prints the reason and validates interactively', async () => {
    const runner = new FakeRunner().on('sudo', () => ok())
    const printed: string[] = []
    const ctx = await PrivilegeContext.acquire('2 changes need administrator rights', runner, l => printed.push(l))
    expect(printed).toEqual(['2 changes need administrator rights'])
    expect(runner.interactiveCalls).toEqual(['sudo -v'])
    expect(ctx.valid).toBe(true)
  })

  it('rejects with privilege_denied when validation fails', async () => {
    const runner = new FakeRunner()
    runner.interactiveCode = 1
    await expect(PrivilegeContext.acquire('why', runner)).rejects.toMatchObject({ detail: { kind: 'privilege_denied' } })
  })

  it('runs commands non-interactively until released', async () => {
    const runner = new FakeRunner().on('sudo', () => ok())
    const ctx = await PrivilegeContext.acquire('why', runner)
    await ctx.run('defaults', ['write', '/Library/Preferences/x', 'k', '-bool', 'true'])
    await ctx.release()
    await ctx.release()
    expect(runner.calls).toEqual(['sudo -n defaults write /Library/Preferences/x k -bool true', 'sudo -k'])
    await expect(ctx.run('true', [])).rejects.toMatchObject({ detail: { kind: 'not_validated' } })
  })

  it('checks the cached credential without prompting', async () => {
    const runner = new FakeRunner().on('sudo', args => (args.join(' ') === '-n true' ? fail('a password is required') : ok()))
    expect(await PrivilegeContext.isValid(runner)).toBe(false)
    expect(runner.calls).toEqual(['sudo -n true'])
    expect(await PrivilegeContext.isValid(new FakeRunner())).toBe(false)
  })
})

describe('withPrivilege', () => {
  it('releases after success', async () => {
    const session = new FakeSession()
    const result = await withPrivilege(session, async s => {
      expect(s.valid).toBe(true)
      return 42
    })
    expect(result).toBe(42)
    expect(session.valid).toBe(false)
  })

  it('releases after a failure and removes its signal handlers', async () => {
    const before = process.listenerCount('SIGINT')
    const session = new FakeSession()
    await expect(withPrivilege(session, async () => { throw new Error('batch died') })).rejects.toThrow('batch died')
    expect(session.valid).toBe(false)
    expect(process.listenerCount('SIGINT')).toBe(before)
  })
})
