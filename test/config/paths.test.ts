import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import path from 'path'
import {
  getLbsonHome,
  getConfigPath,
  getLocalConfigPath,
  getLogsPath,
  getAuditPath,
} from '../../src/config/paths.js'

describe('getLbsonHome', () => {
  const originalEnv = { ...process.env }

  beforeEach(() => {
    delete process.env.LBSON_HOME
    delete process.env.XDG_CONFIG_HOME
  })

  afterEach(() => {
    process.env = { ...originalEnv }
  })

  it('returns LBSON_HOME when set', () => {
    process.env.LBSON_HOME = '/custom/lbson'
    expect(getLbsonHome()).toBe('/custom/lbson')
  })

  it('returns XDG_CONFIG_HOME/lbson when set', () => {
    process.env.XDG_CONFIG_HOME = '/home/user/.config'
    expect(getLbsonHome()).toBe(path.join('/home/user/.config', 'lbson'))
  })

  it('returns platform default when no env vars set', () => {
    expect(getLbsonHome().includes('lbson')).toBe(true)
  })
})

describe('derived paths', () => {
  const originalEnv = { ...process.env }

  beforeEach(() => {
    process.env.LBSON_HOME = '/test/lbson'
  })

  afterEach(() => {
    process.env = { ...originalEnv }
  })

  it('places config files in the home directory', () => {
    expect(getConfigPath()).toBe(path.join('/test/lbson', 'config.json'))
    expect(getLocalConfigPath()).toBe(path.join('/test/lbson', 'config.local.json'))
  })

  it('places audit logs under logs/audit', () => {
    expect(getLogsPath()).toBe(path.join('/test/lbson', 'logs'))
    expect(getAuditPath()).toBe(path.join('/test/lbson', 'logs', 'audit'))
  })
})

describe('explicit environment', () => {
  it('resolves every path from the given environment', () => {
    const env = { LBSON_HOME: '/given/lbson' }

    expect(getLbsonHome(env)).toBe('/given/lbson')
    expect(getConfigPath(env)).toBe(path.join('/given/lbson', 'config.json'))
    expect(getLocalConfigPath(env)).toBe(path.join('/given/lbson', 'config.local.json'))
    expect(getAuditPath(env)).toBe(path.join('/given/lbson', 'logs', 'audit'))
  })

  it('prefers the given environment over the process environment', () => {
    const previous = process.env.LBSON_HOME
    process.env.LBSON_HOME = '/process/lbson'
    try {
      expect(getLbsonHome({ XDG_CONFIG_HOME: '/given/config' })).toBe(
        path.join('/given/config', 'lbson')
      )
    } finally {
      if (previous === undefined) delete process.env.LBSON_HOME
      else process.env.LBSON_HOME = previous
    }
  })
})
