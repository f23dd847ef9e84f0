// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { ActorState } from './ActorState.js'
import { DeadLetter } from './DeadLetters.js'
import type { Environment } from './Environment.js'
import type { Message } from './Message.js'
import { Completion, describeOutcome, poisoned, shutdown, Undelivered } from './Outcome.js'

/**
 * The single consumer of one actor's mailbox.
 *
 * Repeatedly receives the next message and processes it to completion
 * before receiving another, so no two tasks of the actor ever overlap:
 * - Running: the task is invoked; a failure poisons the actor
 * - Poisoned: the task is answered with Poisoned without being invoked
 *
 * Every received message gets exactly one outcome. The loop ends when
 * the mailbox is closed and drained. After an immediate stop, a message
 * the loop has received but not started is answered with Shutdown.
 */
export class ExecutionLoop {
  private readonly _environment: Environment
  private readonly _state: ActorState
  private _running: Promise<void> | undefined = undefined
  private _executing: boolean = false
  private _immediate: boolean = false

  /**
   * Creates a loop for an actor. It does not consume until start().
   * @param environment The actor's environment
   * @param state The actor's state; this loop is its only writer
   */
  constructor(environment: Environment, state: ActorState) {
    this._environment = environment
    this._state = state
  }

  /**
   * Starts consuming. Later calls have no effect.
   */
  start(): void {
    if (this._running) {
      return
    }

    this._running = this.run().catch((error: unknown) => {
      const errorObj = error instanceof Error ? error : new Error(String(error))
      this._environment.logger().error(`${this._environment} loop crashed: ${errorObj.message}`, errorObj)
      this._environment.mailbox().close()
      this.rejectRemaining()
    })
  }

  /**
   * Returns a promise that resolves once the loop has stopped.
   * Resolves immediately for a loop that was never started.
   */
  terminated(): Promise<void> {
    return this._running ? this._running : Promise.resolve()
  }

  /**
   * Returns whether a task is being invoked right now.
   */
  isExecuting(): boolean {
    return this._executing
  }

  /**
   * Stops running tasks: everything queued, and anything received but not
   * yet started, is answered with Shutdown. A task already in flight finishes.
   * @returns The number of queued messages rejected
   */
  stopImmediately(): number {
    this._immediate = true
    return this.rejectRemaining()
  }

  /**
   * Answers every message still queued with Shutdown, without running it.
   * @returns The number of messages rejected
   */
  rejectRemaining(): number {
    const remaining = this._environment.mailbox().drain()

    remaining.forEach(message => this.reject(message, shutdown()))

    return remaining.length
  }

  private async run(): Promise<void> {
    const mailbox = this._environment.mailbox()

    for (;;) {
      const message = await mailbox.receive()

      if (!message.isDeliverable()) {
        break
      }

      await this.process(message)
    }

    this._environment.logger().debug(`${this._environment} subject: loop stopped`)
  }

  private async process(message: Message): Promise<void> {
    if (this._immediate) {
      this.reject(message, shutdown())
      return
    }

    const poisonReason = this._state.reason()

    if (poisonReason !== undefined) {
      this.reject(message, poisoned(poisonReason))
      return
    }

    this._executing = true
    try {
      await message.deliver(completion => this.observe(message, completion))
    } finally {
      this._executing = false
    }
  }

  /**
   * Poisons the actor on failure, before the reply becomes visible, so a
   * caller that observed the failure never finds the actor still Running.
   */
  private observe(message: Message, completion: Completion<unknown>): void {
    if (completion.status === 'failure') {
      this._state.poison(completion.reason)
      this._environment.logger().error(
        `${this._environment} subject: ${message.representation()} failed and poisoned the actor: ${completion.reason}`
      )
    }
  }

  private reject(message: Message, outcome: Undelivered): void {
    message.reject(outcome)

    const deadLetter = new DeadLetter(this._environment, message.representation(), describeOutcome(outcome))
    this._environment.stage().deadLetters().failedDelivery(deadLetter)
  }
}
