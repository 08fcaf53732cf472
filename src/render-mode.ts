import { ConfigError } from './config/errors.js'

/**
 * How labeled content renders through default textual conversion.
 *
 * - protected: labeled values render as a placeholder; rendering the
 *   labeled wrappers themselves throws
 * - debug: labeled payloads render for diagnostics (development and test
 *   environments only, enforced by config validation)
 */
export type RenderMode = 'debug' | 'protected'

let currentMode: RenderMode = 'protected'
let fixed = false

/**
 * Fix the render mode for the life of the process.
 *
 * Called once at startup. Repeating the same mode is a no-op; switching to
 * a different mode afterwards throws.
 */
export function setRenderMode(mode: RenderMode): void {
  if (fixed && mode !== currentMode) {
    throw new ConfigError(
      `Render mode is already fixed to '${currentMode}'`,
      'render_mode_locked',
      'rendering.debug'
    )
  }
  currentMode = mode
  fixed = true
}

export function getRenderMode(): RenderMode {
  return currentMode
}

export function isDebugRendering(): boolean {
  return currentMode === 'debug'
}

/**
 * Check whether startup has fixed the render mode yet.
 */
export function isRenderModeFixed(): boolean {
  return fixed
}

/**
 * Return to the unfixed protected default (for testing).
 */
export function resetRenderMode(): void {
  currentMode = 'protected'
  fixed = false
}
