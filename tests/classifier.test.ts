import { describe, expect, it } from 'vitest'

import { classifierFor, emptyPrivilegeConfig, PrivilegeConfig, requiresPrivilege } from '../src/core/classifier.js'

const config: PrivilegeConfig = {
  privilegedPackages: new Set(['docker']),
  privilegedPreferences: new Set(['com.apple.loginwindow.GuestEnabled']),
}

describe('requiresPrivilege', () => {
  it('applies the package allowlist to every package kind', () => {
    expect(requiresPrivilege('formula', 'docker', config)).toBe(true)
    expect(requiresPrivilege('cask', 'docker', config)).toBe(true)
    expect(requiresPrivilege('formula', 'ripgrep', config)).toBe(false)
  })

  it('applies the preference allowlist to preferences only', () => {
    expect(requiresPrivilege('preference', 'com.apple.loginwindow.GuestEnabled', config)).toBe(true)
    expect(requiresPrivilege('formula', 'com.apple.loginwindow.GuestEnabled', config)).toBe(false)
  })

  it('never elevates other kinds', () => {
    expect(requiresPrivilege('symlink', 'docker', config)).toBe(false)
    expect(requiresPrivilege('service', 'docker', config)).toBe(false)
  })

  it('is false for everything with an empty config', () => {
    const classify = classifierFor(emptyPrivilegeConfig())
    expect(classify('formula', 'docker')).toBe(false)
  })
})
