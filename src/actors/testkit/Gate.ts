// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * One-way latch for holding a task inside the execution loop until
 * the test lets it finish.
 *
 * ```typescript
 * const gate = new Gate()
 * await handle.send(async () => { await gate.wait(); return ok() })
 * // ... the actor is busy; queue more work ...
 * gate.open()
 * ```
 */
export class Gate {
  private readonly opened: Promise<void>
  private readonly release: () => void
  private _isOpen: boolean = false
  private _waiting: number = 0

  constructor() {
    let release: () => void = () => {}
    this.opened = new Promise<void>(resolve => {
      release = resolve
    })
    this.release = release
  }

  open(): void {
    this._isOpen = true
    this.release()
  }

  isOpen(): boolean {
    return this._isOpen
  }

  wait(): Promise<void> {
    this._waiting++
    return this.opened
  }

  /**
   * Returns how many times wait() was called, which tells a test that
   * a task holding the gate has started.
   */
  waiting(): number {
    return this._waiting
  }
}
