/**
 * Keyed async mutex. Work queued under the same key runs one at a time, in call order.
 */

import { resolve } from 'node:path'

export class VaultLock {
  private tails = new Map<string, Promise<void>>()

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()
    const run = previous.then(fn)
    // The tail never rejects, so a failed run does not block the next one.
    const tail = run.then(() => undefined, () => undefined)
    this.tails.set(key, tail)

    try {
      return await run
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key)
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key)
  }
}

/** Lock shared by every indexer in the process. */
export const sharedVaultLock = new VaultLock()

/** Lock key for a vault root. */
export function vaultLockKey(vaultPath: string): string {
  return resolve(vaultPath)
}
