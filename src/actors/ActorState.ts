// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * Status of an actor. Poisoned is terminal.
 */
export enum ActorStatus {
  Running,
  Poisoned
}

/**
 * Read-only view of an actor's state, as seen by producers.
 */
export interface ActorStateView {
  status(): ActorStatus
  isPoisoned(): boolean

  /**
   * Returns the reason reported by the task that poisoned the actor.
   * @returns The reason, or undefined while Running
   */
  reason(): string | undefined
}

/**
 * Running/Poisoned state of one actor.
 *
 * Written only by the actor's ExecutionLoop, at most once, immediately
 * after a task reports failure. Producers only ever hold an ActorStateView.
 */
export class ActorState implements ActorStateView {
  private _status: ActorStatus = ActorStatus.Running
  private _reason: string | undefined = undefined

  status(): ActorStatus {
    return this._status
  }

  isPoisoned(): boolean {
    return this._status === ActorStatus.Poisoned
  }

  reason(): string | undefined {
    return this._reason
  }

  /**
   * Transitions Running to Poisoned.
   * @param reason The failure reason of the task that poisoned the actor
   * @returns true on the transition, false if already poisoned (the first reason is kept)
   */
  poison(reason: string): boolean {
    if (this.isPoisoned()) {
      return false
    }
    this._status = ActorStatus.Poisoned
    this._reason = reason
    return true
  }
}
