import { describe, expect, it } from 'vitest'

import { canonicalValue, parseValue, PreferenceResource } from '../src/resources/preference.js'
import { ApplyContext } from '../src/types.js'
import { FakeRunner, FakeSession, fail, ok } from './helpers/fakes.js'

const ctx: ApplyContext = { dryRun: false, verbose: false, privilegedRunner: null }

/**
 * `defaults` backed by a map of `domain key` to the raw string it prints.
 */
function defaultsRunner(store: Map<string, string>): FakeRunner {
  return new FakeRunner().on('defaults', args => {
    const [verb, domain, key, , value] = args
    const k = `${domain} ${key}`
    if (verb === 'read') {
      const v = store.get(k)
      return v === undefined ? fail(`The domain/default pair of (${domain}, ${key}) does not exist`) : ok(`${v}\n`)
    }
    store.set(k, value === 'true' ? '1' : value === 'false' ? '0' : value)
    return ok()
  })
}

describe('parseValue', () => {
  it('parses by the desired variant', () => {
    expect(parseValue('bool', '1\n')).toEqual({ type: 'bool', value: true })
    expect(parseValue('bool', 'false')).toEqual({ type: 'bool', value: false })
    expect(parseValue('bool', 'maybe')).toBeUndefined()
    expect(parseValue('int', '42\n')).toEqual({ type: 'int', value: 42 })
    expect(parseValue('int', '4.2')).toBeUndefined()
    expect(parseValue('float', '0.25')).toEqual({ type: 'float', value: 0.25 })
    expect(parseValue('float', '')).toBeUndefined()
    expect(parseValue('string', ' padded \n')).toEqual({ type: 'string', value: ' padded ' })
  })

  it('canonicalizes values', () => {
    expect(canonicalValue({ type: 'bool', value: true })).toBe('true')
    expect(canonicalValue({ type: 'float', value: 1.5 })).toBe('1.5')
  })
})

describe('PreferenceResource', () => {
  it('is converged when the stored bool already matches', async () => {
    const runner = defaultsRunner(new Map([['com.example.browser ShowPathbar', '1']]))
    const r = new PreferenceResource('com.example.browser', 'ShowPathbar', { type: 'bool', value: true }, runner)
    expect(r.id).toBe('com.example.browser.ShowPathbar')
    expect(await r.currentState()).toEqual({ state: 'present', details: 'true' })
    expect(r.desiredState()).toEqual({ state: 'present', details: 'true' })
  })

  it('reports drift as modified and rewrites it', async () => {
    const store = new Map([['com.example.browser ShowPathbar', '0']])
    const runner = defaultsRunner(store)
    const r = new PreferenceResource('com.example.browser', 'ShowPathbar', { type: 'bool', value: true }, runner)

    expect(await r.currentState()).toEqual({ state: 'modified', from: 'false', to: 'true' })
    expect(await r.apply(ctx)).toEqual({ status: 'modified' })
    expect(runner.calls).toContain('defaults write com.example.browser ShowPathbar -bool true')
    expect(await r.currentState()).toEqual({ state: 'present', details: 'true' })
    expect(await r.apply(ctx)).toEqual({ status: 'no_change' })
  })

  it('creates a missing key', async () => {
    const runner = defaultsRunner(new Map())
    const r = new PreferenceResource('com.apple.dock', 'tilesize', { type: 'int', value: 48 }, runner)
    expect(await r.currentState()).toEqual({ state: 'absent' })
    expect(await r.apply(ctx)).toEqual({ status: 'created' })
    expect(runner.calls.at(-1)).toBe('defaults write com.apple.dock tilesize -int 48')
  })

  it('treats an unparsable stored value as absent', async () => {
    const runner = defaultsRunner(new Map([['com.apple.dock tilesize', 'large']]))
    const r = new PreferenceResource('com.apple.dock', 'tilesize', { type: 'int', value: 48 }, runner)
    expect(await r.currentState()).toEqual({ state: 'absent' })
  })

  it('uses -g for the global domain', async () => {
    const runner = defaultsRunner(new Map())
    const r = new PreferenceResource('NSGlobalDomain', 'AppleShowAllExtensions', { type: 'bool', value: true }, runner)
    await r.currentState()
    expect(runner.calls).toEqual(['defaults read -g AppleShowAllExtensions'])
  })

  it('writes through the privileged runner when elevated', async () => {
    const runner = defaultsRunner(new Map([['/Library/Preferences/com.apple.loginwindow GuestEnabled', '1']]))
    const r = new PreferenceResource(
      '/Library/Preferences/com.apple.loginwindow',
      'GuestEnabled',
      { type: 'bool', value: false },
      runner,
      { privileged: true },
    )
    const session = new FakeSession()
    expect(await r.apply({ ...ctx, privilegedRunner: session })).toEqual({ status: 'modified' })
    expect(session.commands).toEqual(['defaults write /Library/Preferences/com.apple.loginwindow GuestEnabled -bool false'])

    const denied = await r.apply(ctx)
    expect(denied.status === 'failed' && denied.error?.kind).toBe('not_validated')
  })

  it('surfaces a platform without defaults as unsupported', async () => {
    const r = new PreferenceResource('com.x', 'y', { type: 'string', value: 'z' }, new FakeRunner())
    await expect(r.currentState()).rejects.toMatchObject({ detail: { kind: 'unsupported' } })
  })

  it('carries its restart as a post-action', () => {
    const r = new PreferenceResource('com.apple.finder', 'ShowPathbar', { type: 'bool', value: true }, new FakeRunner(), { restart: 'Finder' })
    expect(r.postAction).toBe('Finder')
  })
})
