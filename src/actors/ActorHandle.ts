// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { PoisonedSendPolicy, ShutdownMode } from './ActorConfig.js'
import type { ActorStatus } from './ActorState.js'
import type { Address } from './Address.js'
import { DeadLetter } from './DeadLetters.js'
import type { Environment } from './Environment.js'
import type { SendOptions } from './Mailbox.js'
import { abandoned, Outcome, poisoned, rejected, shutdown } from './Outcome.js'
import { PendingReply } from './PendingReply.js'
import { refused, SendError, SendErrorKind, SendResult } from './SendError.js'
import type { Task } from './Task.js'
import { TaskMessage } from './TaskMessage.js'

/**
 * Options for sendAndWait().
 *
 * The timeout and signal bound the whole call: waiting for mailbox space,
 * then waiting for the reply. Giving up the reply wait answers Abandoned;
 * the task stays queued and may still run.
 */
export type WaitOptions = SendOptions

/**
 * Reference to a running actor, and the only way to submit tasks to it.
 *
 * ```typescript
 * let count = 0
 * const counter = stage().spawn({ name: 'counter' })
 *
 * await counter.send(() => { count++; return ok() })
 * const outcome = await counter.sendAndWait(() => ok(count))
 * // outcome: { status: 'success', value: 1 }
 * ```
 *
 * Handles are cheap. clone() produces another handle to the same actor;
 * the actor lives until its last handle is released or it is stopped.
 * A released handle refuses every submission with Closed.
 *
 * No submission method ever rejects: enqueue errors come back as a
 * SendResult, and task results as an Outcome.
 */
export class ActorHandle {
  private readonly _environment: Environment
  private _released: boolean = false

  /**
   * Creates a handle and counts it as live.
   * Obtain handles from Stage.spawn() or clone(), not from this constructor.
   *
   * @param environment The environment of the actor
   */
  constructor(environment: Environment) {
    this._environment = environment
    environment.retainHandle()
  }

  /**
   * Submits a task without waiting for it to run (fire-and-forget).
   *
   * The result reports only whether the task was accepted into the mailbox.
   * A task that later fails is logged and poisons the actor; a task that
   * never runs becomes a dead letter. Use sendAndWait() to observe the outcome.
   *
   * @param task The task to run
   * @param options Timeout and abort signal, for a bounded mailbox that is full
   * @returns Promise resolving to the enqueue result
   */
  send<T>(task: Task<T>, options: SendOptions = {}): Promise<SendResult> {
    const message = new TaskMessage(task, new PendingReply<T>(), TaskMessage.representationOf(task))

    return this.submit(message, options)
  }

  /**
   * Submits a task and waits for its outcome (submit-and-wait).
   *
   * Answers:
   * - success / failure: the task ran
   * - poisoned: an earlier task poisoned the actor; this one never ran
   * - shutdown: the actor stopped before this task ran
   * - rejected: the mailbox refused the task (QueueFull, Cancelled)
   * - abandoned: the timeout elapsed or the signal aborted while waiting
   *
   * @param task The task to run
   * @param options Timeout and abort signal bounding the whole call
   * @returns Promise resolving to the outcome; it never rejects
   */
  async sendAndWait<T>(task: Task<T>, options: WaitOptions = {}): Promise<Outcome<T>> {
    const deadline = options.timeout !== undefined ? Date.now() + options.timeout : undefined
    const reply = new PendingReply<T>()
    const message = new TaskMessage(task, reply, TaskMessage.representationOf(task))

    const sent = await this.submit(message, options)

    if (!sent.accepted) {
      return this.outcomeOfRefusal<T>(sent.error)
    }

    return this.awaitReply(reply, deadline, options.signal)
  }

  /**
   * Produces another handle to the same actor.
   * @returns A new live handle
   * @throws Error if this handle was released
   */
  clone(): ActorHandle {
    if (this._released) {
      throw new Error('Cannot clone a released ActorHandle')
    }
    return this._environment.stage().handleFor(this._environment)
  }

  /**
   * Releases this handle. Releasing the last live handle stops the actor
   * with its configured shutdown mode. Releasing twice has no effect.
   *
   * @returns Promise that resolves when this release is done; for the last
   * handle, when the execution loop has terminated
   */
  release(): Promise<void> {
    if (this._released) {
      return Promise.resolve()
    }

    this._released = true
    this._environment.stage().forgetHandle(this)

    if (this._environment.releaseHandle() > 0) {
      return Promise.resolve()
    }

    return this._environment.stop(this._environment.shutdownMode())
  }

  /**
   * Stops the actor for every handle.
   *
   * @param mode Graceful (default) runs what is queued; Immediate answers it with Shutdown
   * @returns Promise that resolves when the execution loop has terminated
   */
  stop(mode: ShutdownMode = ShutdownMode.Graceful): Promise<void> {
    return this._environment.stop(mode)
  }

  address(): Address {
    return this._environment.address()
  }

  name(): string {
    return this._environment.name()
  }

  status(): ActorStatus {
    return this._environment.state().status()
  }

  isPoisoned(): boolean {
    return this._environment.state().isPoisoned()
  }

  /**
   * Returns the reason of the failure that poisoned the actor.
   * @returns The reason, or undefined while Running
   */
  poisonReason(): string | undefined {
    return this._environment.state().reason()
  }

  isStopped(): boolean {
    return this._environment.isStopped()
  }

  isReleased(): boolean {
    return this._released
  }

  /**
   * Returns the number of live handles to this actor.
   */
  handleCount(): number {
    return this._environment.handleCount()
  }

  equals(other: ActorHandle): boolean {
    return this.address().equals(other.address())
  }

  toString(): string {
    return 'ActorHandle[' + this._environment.toString() + ']'
  }

  /**
   * Enqueues the message unless the handle is released or, under
   * RejectAtSend, the actor is poisoned. Everything that gets refused
   * becomes a dead letter.
   *
   * The mailbox queues an accepted message synchronously, before the
   * returned promise settles.
   */
  private submit<T>(message: TaskMessage<T>, options: SendOptions): Promise<SendResult> {
    if (this._released) {
      return Promise.resolve(this.refuse(message, SendError.closed('Actor handle is released')))
    }

    const poisonReason = this._environment.state().reason()

    if (poisonReason !== undefined && this._environment.poisonedSendPolicy() === PoisonedSendPolicy.RejectAtSend) {
      return Promise.resolve(this.refuse(message, SendError.poisoned(poisonReason)))
    }

    return this._environment.mailbox().send(message, options).then(result => {
      if (!result.accepted) {
        this.deadLetter(message, result.error.message)
      }
      return result
    })
  }

  private refuse<T>(message: TaskMessage<T>, error: SendError): SendResult {
    this.deadLetter(message, error.message)
    return refused(error)
  }

  private deadLetter<T>(message: TaskMessage<T>, reason: string): void {
    const deadLetter = new DeadLetter(this._environment, message.representation(), reason)
    this._environment.stage().deadLetters().failedDelivery(deadLetter)
  }

  private outcomeOfRefusal<T>(error: SendError): Outcome<T> {
    switch (error.kind()) {
      case SendErrorKind.Closed:
        return shutdown()
      case SendErrorKind.Poisoned:
        return poisoned(error.poisonReason() ?? error.message)
      case SendErrorKind.QueueFull:
      case SendErrorKind.Cancelled:
        return rejected(error)
    }
  }

  /**
   * Waits for the reply, or until the deadline passes or the signal aborts.
   */
  private async awaitReply<T>(
    reply: PendingReply<T>,
    deadline: number | undefined,
    signal: AbortSignal | undefined
  ): Promise<Outcome<T>> {
    if (deadline === undefined && signal === undefined) {
      return reply.promise()
    }

    const pending: { timer?: ReturnType<typeof setTimeout>, onAbort?: () => void } = {}

    const giveUp = new Promise<Outcome<T>>(resolve => {
      if (signal?.aborted) {
        resolve(abandoned())
        return
      }
      if (deadline !== undefined) {
        pending.timer = setTimeout(() => resolve(abandoned()), Math.max(0, deadline - Date.now()))
      }
      if (signal) {
        pending.onAbort = () => resolve(abandoned())
        signal.addEventListener('abort', pending.onAbort, { once: true })
      }
    })

    try {
      return await Promise.race([reply.promise(), giveUp])
    } finally {
      if (pending.timer !== undefined) {
        clearTimeout(pending.timer)
      }
      if (pending.onAbort && signal) {
        signal.removeEventListener('abort', pending.onAbort)
      }
    }
  }
}
