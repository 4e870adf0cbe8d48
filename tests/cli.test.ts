import { afterEach, beforeAll, beforeEach, describe, expect, it } from 'vitest'
import chalk from 'chalk'
import fs from 'fs-extra'
import os from 'node:os'
import path from 'node:path'

import { CliEnv, main } from '../src/cli.js'
import { getSettingsPath } from '../src/cli/config.js'
import { ConvergeError } from '../src/core/errors.js'
import { CaptureSink, FakeRunner, FakeSession, ScriptedConfirmer, fail, ok } from './helpers/fakes.js'

const brewInfo = (installed: boolean) =>
  JSON.stringify({ formulae: [{ installed: installed ? [{ version: '1.0' }] : [] }], casks: [] })

/**
 * brew that knows which formulae exist and remembers what it installed.
 */
function fakeBrew(runner: FakeRunner, available: string[], installed = new Set<string>()): FakeRunner {
  return runner.on('brew', args => {
    const name = args[args.length - 1]
    if (args[0] === 'info') return ok(brewInfo(installed.has(name)))
    if (!available.includes(name)) return fail(`Error: No available formula with the name "${name}".`)
    installed.add(name)
    return ok()
  })
}

function fakeDefaults(runner: FakeRunner, store: Map<string, string>): FakeRunner {
  return runner.on('defaults', args => {
    const [verb, domain, key, , value] = args
    if (verb === 'read') {
      const v = store.get(`${domain}.${key}`)
      return v === undefined ? fail('does not exist') : ok(`${v}\n`)
    }
    store.set(`${domain}.${key}`, value === 'true' ? '1' : value === 'false' ? '0' : value)
    return ok()
  })
}

describe('cli', () => {
  let tmp: string
  let runner: FakeRunner
  let stdout: CaptureSink
  let stderr: CaptureSink
  let configPath: string

  beforeAll(() => {
    chalk.level = 0
  })

  beforeEach(async () => {
    tmp = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'homestate-cli-')))
    runner = new FakeRunner()
    stdout = new CaptureSink()
    stderr = new CaptureSink()
    configPath = path.join(tmp, 'homestate.json')
  })

  afterEach(async () => {
    await fs.remove(tmp)
  })

  const env = (extra: Partial<CliEnv> = {}): Partial<CliEnv> => ({
    runner,
    stdout,
    stderr,
    env: { XDG_CONFIG_HOME: path.join(tmp, 'xdg') },
    homeDir: tmp,
    retry: { maxAttempts: 1, baseDelayMs: 0, backoffFactor: 2, maxDelayMs: 0 },
    ...extra,
  })

  const lines = () => stdout.text.split('\n')

  it('installs a missing formula', async () => {
    await fs.writeJson(configPath, { packages: [{ kind: 'formula', name: 'ripgrep' }] })
    fakeBrew(runner, ['ripgrep'])

    const code = await main(['apply', '-c', configPath, '--yes'], env())

    expect(code).toBe(0)
    expect(lines()).toContain('  + ripgrep: absent → present')
    expect(lines()).toContain('  ✓ ripgrep: created')
    expect(lines()).toContain('Summary: created 1, modified 0, removed 0, skipped 0, failed 0, no change 0')
    expect(runner.calls).toContain('brew install --formula ripgrep')
  })

  it('reports an up-to-date preference without touching it', async () => {
    await fs.writeJson(configPath, {
      preferences: [{ domain: 'com.example.browser', key: 'ShowPathbar', type: 'bool', value: true }],
    })
    fakeDefaults(runner, new Map([['com.example.browser.ShowPathbar', '1']]))

    expect(await main(['status', '-c', configPath], env())).toBe(0)
    expect(stdout.text).toBe('Everything is up to date.\n')

    expect(await main(['apply', '-c', configPath, '--yes'], env())).toBe(0)
    expect(runner.calls.filter(c => c.startsWith('defaults write'))).toEqual([])
  })

  it('applies a privileged preference with a single prompt and restarts its process', async () => {
    await fs.writeJson(configPath, {
      preferences: [{ domain: 'com.example.browser', key: 'ShowPathbar', type: 'bool', value: true, restart: 'Browser' }],
      services: ['Browser'],
      privilege_allowlist: { preferences: ['com.example.browser.ShowPathbar'] },
    })
    fakeDefaults(runner, new Map([['com.example.browser.ShowPathbar', '0']]))
    runner.on('killall', () => ok())
    const session = new FakeSession(runner)
    const confirm = new ScriptedConfirmer([true])

    const code = await main(['apply', '-c', configPath], env({ confirm, acquirePrivilege: async () => session }))

    expect(code).toBe(0)
    expect(lines()).toContain('  ~ com.example.browser.ShowPathbar: false → true [privileged]')
    expect(confirm.prompts).toEqual(['Apply changes?'])
    expect(session.commands).toEqual(['defaults write com.example.browser ShowPathbar -bool true'])
    expect(runner.calls.at(-1)).toBe('killall Browser')
    expect(session.valid).toBe(false)
    expect(lines()).toContain('Summary: created 0, modified 1, removed 0, skipped 0, failed 0, no change 0')
  })

  it('replaces a symlink that points at the wrong target', async () => {
    const source = path.join(tmp, 'opt', 'cfg', 'a')
    const old = path.join(tmp, 'opt', 'old', 'a')
    const target = path.join(tmp, '.arc')
    await fs.outputFile(source, 'new\n')
    await fs.symlink(old, target)
    await fs.writeJson(configPath, { symlinks: [{ source, target: '~/.arc' }] })

    expect(await main(['diff', '-c', configPath], env())).toBe(0)
    expect(stdout.text).toBe(`symlink\n  ~ ${target}: ${old} → ${source}\n`)

    expect(await main(['apply', '-c', configPath, '--yes'], env())).toBe(0)
    expect(await fs.readlink(target)).toBe(source)
  })

  it('keeps going when one formula fails and exits 1', async () => {
    await fs.writeJson(configPath, {
      packages: ['A', 'B', 'C'].map(name => ({ kind: 'formula', name })),
    })
    fakeBrew(runner, ['A', 'C'])

    const code = await main(['apply', '-c', configPath, '--yes', '--jobs', '2'], env())

    expect(code).toBe(1)
    expect(lines()).toContain('Summary: created 2, modified 0, removed 0, skipped 0, failed 1, no change 0')
    expect(lines()).toContain('  ✗ formula B: not_found (not found: B)')
  })

  it('limits apply to the target', async () => {
    await fs.writeJson(configPath, {
      packages: [{ kind: 'formula', name: 'ripgrep' }],
      preferences: [{ domain: 'com.x.Y', key: 'Z', type: 'bool', value: true }],
    })
    fakeBrew(runner, ['ripgrep'])
    fakeDefaults(runner, new Map())

    const code = await main(['apply', '-c', configPath, '--yes', '--target', 'packages.rip'], env())

    expect(code).toBe(0)
    expect(stdout.text).not.toContain('com.x.Y.Z')
    expect(runner.calls.filter(c => c.startsWith('defaults write'))).toEqual([])
    expect(lines()).toContain('Summary: created 1, modified 0, removed 0, skipped 0, failed 0, no change 0')
  })

  it('changes nothing on a dry run', async () => {
    await fs.writeJson(configPath, { packages: [{ kind: 'formula', name: 'ripgrep' }] })
    fakeBrew(runner, ['ripgrep'])

    expect(await main(['apply', '-c', configPath, '--dry-run'], env())).toBe(0)
    expect(runner.calls.every(c => c.startsWith('brew info'))).toBe(true)
    expect(lines()).toContain('Dry run: no changes applied.')
  })

  it('exits 3 when elevation is refused', async () => {
    await fs.writeJson(configPath, { packages: [{ kind: 'formula', name: 'docker', privileged: true }] })
    fakeBrew(runner, ['docker'])
    const refuse = async (): Promise<FakeSession> => { throw new ConvergeError({ kind: 'privilege_denied' }) }

    expect(await main(['apply', '-c', configPath, '--yes'], env({ acquirePrivilege: refuse }))).toBe(3)
    expect(lines()).toContain('Privileged changes were not applied: administrator rights were refused.')
  })

  it('prints diffs as JSON', async () => {
    await fs.writeJson(configPath, { packages: [{ kind: 'formula', name: 'ripgrep' }] })
    fakeBrew(runner, [])

    expect(await main(['diff', '-c', configPath, '--json'], env())).toBe(0)
    expect(JSON.parse(stdout.text)).toEqual([{
      id: 'ripgrep',
      kind: 'formula',
      description: 'Homebrew formula ripgrep',
      current: { state: 'absent' },
      desired: { state: 'present' },
      privileged: false,
    }])
  })

  it('exits 2 on configuration errors', async () => {
    await fs.writeJson(configPath, { packages: [{ kind: 'formula' }] })
    expect(await main(['status', '-c', configPath], env())).toBe(2)
    expect(stderr.text).toBe(`error: invalid config at ${configPath}: packages[0].name: Required\n`)

    expect(await main(['status'], env())).toBe(2)
  })

  it('warns about unknown fields on stderr', async () => {
    await fs.writeJson(configPath, { colour: 'blue' })
    expect(await main(['status', '-c', configPath], env())).toBe(0)
    expect(stderr.text).toBe('[homestate] unknown field "colour" ignored\n')
  })

  describe('default config path', () => {
    it('config set stores an absolute path that show prints and commands use', async () => {
      await fs.writeJson(configPath, {})
      expect(await main(['config', 'set', configPath], env())).toBe(0)

      const settings = await fs.readJson(getSettingsPath({ env: { XDG_CONFIG_HOME: path.join(tmp, 'xdg') } }))
      expect(settings).toEqual({ configPath })

      stdout.text = ''
      expect(await main(['config', 'show'], env())).toBe(0)
      expect(stdout.text).toBe(`${configPath}\n`)

      stdout.text = ''
      expect(await main(['status'], env())).toBe(0)
      expect(stdout.text).toBe('Everything is up to date.\n')
    })

    it('--config wins over the default', async () => {
      await main(['config', 'set', path.join(tmp, 'missing.json')], env())
      await fs.writeJson(configPath, {})
      expect(await main(['status', '--config', configPath], env())).toBe(0)
    })

    it('config clear removes the default', async () => {
      await main(['config', 'set', configPath], env())
      expect(await main(['config', 'clear'], env())).toBe(0)
      expect(await main(['config', 'show'], env())).toBe(2)
    })

    it('reports a corrupt settings file as a configuration error', async () => {
      const settingsPath = getSettingsPath({ env: { XDG_CONFIG_HOME: path.join(tmp, 'xdg') } })
      await fs.outputFile(settingsPath, '{oops')
      expect(await main(['status'], env())).toBe(2)
      expect(stderr.text.startsWith(`error: invalid config at ${settingsPath}: not valid JSON (`)).toBe(true)

      stderr.text = ''
      await fs.outputJson(settingsPath, { configPath: 42 })
      expect(await main(['config', 'show'], env())).toBe(2)
      expect(stderr.text).toBe(`error: invalid config at ${settingsPath}: configPath: Expected string, received number\n`)
    })
  })

  it('rejects unknown commands and bad --jobs', async () => {
    expect(await main(['frobnicate'], env())).toBe(1)
    await fs.writeJson(configPath, {})
    expect(await main(['apply', '-c', configPath, '--jobs', '0'], env())).toBe(1)
    expect(stderr.text).toContain('Invalid --jobs: 0 (expected a positive integer)')
  })
})
