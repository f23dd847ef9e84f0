// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { Outcome } from './Outcome.js'

/**
 * One-shot result slot for a submit-and-wait submission.
 *
 * Written at most once, by the execution loop (or by shutdown), and read
 * by the single waiting caller. Later writes are ignored.
 */
export class PendingReply<T> {
  private readonly _promise: Promise<Outcome<T>>
  private readonly _settle: (outcome: Outcome<T>) => void
  private _outcome: Outcome<T> | undefined = undefined

  constructor() {
    let settle: (outcome: Outcome<T>) => void = () => {}
    this._promise = new Promise<Outcome<T>>(resolve => {
      settle = resolve
    })
    this._settle = settle
  }

  /**
   * Writes the outcome if none was written yet.
   * @param outcome The outcome to deliver
   * @returns true if this call wrote the outcome
   */
  resolve(outcome: Outcome<T>): boolean {
    if (this._outcome !== undefined) {
      return false
    }
    this._outcome = outcome
    this._settle(outcome)
    return true
  }

  isResolved(): boolean {
    return this._outcome !== undefined
  }

  /**
   * Returns the written outcome without waiting.
   * @returns The outcome, or undefined if not yet written
   */
  outcome(): Outcome<T> | undefined {
    return this._outcome
  }

  /**
   * Returns a promise of the outcome. It never rejects.
   */
  promise(): Promise<Outcome<T>> {
    return this._promise
  }
}
