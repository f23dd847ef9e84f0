// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { Message } from './Message.js'
import { Completion, failure, success, Undelivered } from './Outcome.js'
import type { PendingReply } from './PendingReply.js'
import type { Task } from './Task.js'

/**
 * Message carrying one submitted task and the reply slot for its outcome.
 *
 * Every TaskMessage writes exactly one outcome: either deliver() runs
 * the task, or reject() answers without running it.
 */
export class TaskMessage<T> implements Message {
  private readonly _task: Task<T>
  private readonly _reply: PendingReply<T>
  private readonly _representation: string

  /**
   * Creates a new task message.
   * @param task The task to run
   * @param reply Slot receiving the outcome
   * @param representation String representation (typically the task's name)
   */
  constructor(task: Task<T>, reply: PendingReply<T>, representation: string) {
    this._task = task
    this._reply = reply
    this._representation = representation
  }

  /**
   * Returns a representation for a task: its function name, or "anonymous".
   * @param task The task to describe
   * @returns e.g. "increment()"
   */
  static representationOf<R>(task: Task<R>): string {
    return (task.name ? task.name : 'anonymous') + '()'
  }

  async deliver(observe: (completion: Completion<T>) => void): Promise<Completion<T>> {
    let completion: Completion<T>

    try {
      const result = await this._task()
      completion = result.ok ? success(result.value) : failure(result.reason)
    } catch (error: unknown) {
      const errorObj = error instanceof Error ? error : new Error(String(error))
      completion = failure(errorObj.message)
    }

    try {
      observe(completion)
    } finally {
      this._reply.resolve(completion)
    }

    return completion
  }

  reject(outcome: Undelivered): void {
    this._reply.resolve(outcome)
  }

  isDeliverable(): boolean {
    return true
  }

  representation(): string {
    return this._representation
  }

  toString(): string {
    return 'TaskMessage [task: ' + this._representation + ']'
  }
}
