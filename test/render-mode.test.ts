import { describe, it, expect, afterEach } from 'vitest'
import {
  getRenderMode,
  isDebugRendering,
  isRenderModeFixed,
  resetRenderMode,
  setRenderMode,
} from '../src/render-mode.js'
import { ConfigError } from '../src/config/errors.js'

describe('render mode', () => {
  afterEach(() => {
    resetRenderMode()
  })

  it('defaults to protected and unfixed', () => {
    expect(getRenderMode()).toBe('protected')
    expect(isDebugRendering()).toBe(false)
    expect(isRenderModeFixed()).toBe(false)
  })

  it('fixes the mode on first set', () => {
    setRenderMode('debug')
    expect(getRenderMode()).toBe('debug')
    expect(isDebugRendering()).toBe(true)
    expect(isRenderModeFixed()).toBe(true)
  })

  it('accepts the same mode again', () => {
    setRenderMode('protected')
    expect(() => setRenderMode('protected')).not.toThrow()
  })

  it('refuses to switch once fixed', () => {
    setRenderMode('protected')

    expect(() => setRenderMode('debug')).toThrow(ConfigError)
    try {
      setRenderMode('debug')
    } catch (error) {
      expect(error).toMatchObject({ code: 'render_mode_locked', field: 'rendering.debug' })
    }
    expect(getRenderMode()).toBe('protected')
  })

  it('can be reset for tests', () => {
    setRenderMode('debug')
    resetRenderMode()
    expect(getRenderMode()).toBe('protected')
    expect(isRenderModeFixed()).toBe(false)
  })
})
