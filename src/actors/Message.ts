// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { Completion, failure, Undelivered } from './Outcome.js'

/**
 * A task in transit through an actor's mailbox.
 *
 * Messages are created by ActorHandle on submission, queued by the
 * Mailbox, and delivered by the ExecutionLoop one at a time.
 */
export interface Message {
  /**
   * Invokes the task, hands its completion to observe(), and only then
   * writes it to the pending reply. Never rejects: a thrown error becomes
   * a Failure.
   * @param observe Called with the completion before any caller sees it
   * @returns The outcome of the task
   */
  deliver(observe: (completion: Completion<unknown>) => void): Promise<Completion<unknown>>

  /**
   * Writes an outcome for a task that will never run.
   * @param outcome Poisoned or Shutdown
   */
  reject(outcome: Undelivered): void

  /**
   * Returns whether this message can be delivered.
   * EmptyMessage returns false, real messages return true.
   */
  isDeliverable(): boolean

  /**
   * Returns a human-readable representation, typically the task's name.
   * @returns String representation for logging and dead letters
   */
  representation(): string

  toString(): string
}

/**
 * Sentinel message representing "no message".
 *
 * Returned by Mailbox.receive() once the mailbox is closed and drained,
 * which tells the execution loop to stop.
 */
export const EmptyMessage: Message = {
  deliver(): Promise<Completion<unknown>> {
    return Promise.resolve(failure('not-a-message'))
  },

  reject(): void {},

  isDeliverable(): boolean {
    return false
  },

  representation(): string {
    return 'not-a-message'
  },

  toString(): string {
    return 'EmptyMessage'
  }
}
