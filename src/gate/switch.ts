/**
 * Cache Switch
 *
 * A boolean that turns caching off for every gate that reads it. While off,
 * gates clear their stores and pass calls straight through.
 *
 * Routers and gates take a switch as an option; the process-wide instance
 * below is only the default for callers that do not pass one.
 */

export class CacheSwitch {
  private off = false

  get disabled(): boolean {
    return this.off
  }

  /** Turn caching back on */
  enable(): void {
    this.off = false
  }

  /** Bypass and clear every cache reading this switch */
  disable(): void {
    this.off = true
  }
}

export const globalCacheSwitch = new CacheSwitch()

export function enable(): void {
  globalCacheSwitch.enable()
}

export function disable(): void {
  globalCacheSwitch.disable()
}

export function isCacheDisabled(): boolean {
  return globalCacheSwitch.disabled
}
