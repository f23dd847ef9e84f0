// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { Environment } from './Environment.js'

/**
 * Represents a task that was submitted to an actor but never ran.
 *
 * Created when:
 * - The actor is poisoned and rejects the task
 * - The actor is stopped, or stops immediately with the task still queued
 * - A bounded mailbox refuses or gives up the send
 * - The handle used for the send was already released
 *
 * Dead letters are logged and distributed to registered listeners
 * for monitoring, debugging, or recovery. This is how the outcome of
 * an unsuccessful fire-and-forget send becomes observable.
 */
export class DeadLetter {
  private _environment: Environment
  private _message: string
  private _reason: string

  /**
   * Creates a dead letter.
   * @param environment The actor that did not run the task
   * @param message String representation of the task
   * @param reason Why the task did not run
   */
  constructor(environment: Environment, message: string, reason: string) {
    this._environment = environment
    this._message = message
    this._reason = reason
  }

  environment(): Environment {
    return this._environment
  }

  message(): string {
    return this._message
  }

  reason(): string {
    return this._reason
  }

  /**
   * Returns a formatted string representation of this dead letter.
   * @returns Formatted string with actor name, address, task, and reason
   */
  toString(): string {
    return 'DeadLetter[to: ' + this._environment.name() +
           ' at: ' + this._environment.address().valueAsString() +
           ' subject: ' + this._message +
           ' reason: ' + this._reason +
           ']'
  }
}

/**
 * Listener interface for dead letter notifications.
 *
 * Registered via DeadLetters.registerListener()
 */
export interface DeadLettersListener {
  /**
   * Handles a dead letter notification.
   * @param deadLetter The dead letter to process
   */
  handle(deadLetter: DeadLetter): void
}

/**
 * Central facility for tasks that never ran.
 *
 * Responsibilities:
 * - Logs all dead letters with the actor's logger
 * - Distributes dead letters to registered listeners in registration order
 * - Catches and logs listener errors so they never reach the execution loop
 *
 * Each stage has one DeadLetters instance accessible via stage.deadLetters().
 */
export class DeadLetters {
  private _listeners: DeadLettersListener[] = []

  failedDelivery(deadLetter: DeadLetter): void {
    const logger = deadLetter.environment().logger()

    logger.error(deadLetter.toString())

    this._listeners.forEach((listener: DeadLettersListener) => {
      try {
        listener.handle(deadLetter)
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error)
        logger.error('DeadLetter: Listener crashed because: ' + message, error)
      }
    })
  }

  registerListener(listener: DeadLettersListener): void {
    this._listeners.push(listener)
  }

  /**
   * Removes a previously registered listener.
   * @param listener The listener to remove
   * @returns true if the listener was registered
   */
  deregisterListener(listener: DeadLettersListener): boolean {
    const index = this._listeners.indexOf(listener)
    if (index === -1) {
      return false
    }
    this._listeners.splice(index, 1)
    return true
  }
}
