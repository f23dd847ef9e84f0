// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * Options for await utilities.
 */
export interface AwaitOptions {
  /**
   * Maximum time to wait in milliseconds before throwing.
   * Default: 2000ms
   */
  timeout?: number

  /**
   * Interval between checks in milliseconds.
   * Default: 10ms
   */
  interval?: number
}

/**
 * Repeatedly executes an assertion function until it passes or timeout expires.
 *
 * Useful for testing fire-and-forget sends without hardcoding delays.
 * The assertion function should use normal expect() calls - if they throw,
 * the function retries until timeout.
 *
 * @param assertion Function containing expect() calls
 * @param options Timeout and polling interval options
 * @throws The last assertion error if timeout expires
 *
 * @example
 * ```typescript
 * await counter.send(() => { count++; return ok() })
 * await awaitAssert(() => {
 *   expect(count).toBe(1)
 * }, { timeout: 1000 })
 * ```
 */
export async function awaitAssert(
  assertion: () => Promise<void> | void,
  options: AwaitOptions = {}
): Promise<void> {
  const { timeout = 2000, interval = 10 } = options
  const start = Date.now()
  let lastError: Error | undefined

  while (Date.now() - start < timeout) {
    try {
      await assertion()
      return // Assertion passed!
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error))
      await new Promise(resolve => setTimeout(resolve, interval))
    }
  }

  // Timeout - throw the last assertion error
  throw lastError || new Error('Assertion did not pass within timeout')
}

/**
 * Resolves after the given number of milliseconds.
 */
export function delay(millis: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, millis))
}
