// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * Why a task could not be accepted into an actor's mailbox.
 */
export enum SendErrorKind {
  /** The actor has shut down, or the handle used was released */
  Closed,
  /** A bounded mailbox stayed full */
  QueueFull,
  /** The actor is poisoned and rejects at send time */
  Poisoned,
  /** A send waiting for mailbox space was aborted */
  Cancelled
}

/**
 * Enqueue-time error. Returned as a value inside a SendResult, never thrown.
 * Never affects the actor's state.
 */
export class SendError extends Error {
  private readonly _kind: SendErrorKind
  private readonly _poisonReason: string | undefined

  static closed(message: string = 'Actor mailbox is closed'): SendError {
    return new SendError(SendErrorKind.Closed, message)
  }

  static queueFull(): SendError {
    return new SendError(SendErrorKind.QueueFull, 'Actor mailbox is full')
  }

  static poisoned(reason: string): SendError {
    return new SendError(SendErrorKind.Poisoned, `Actor is poisoned: ${reason}`, reason)
  }

  static cancelled(): SendError {
    return new SendError(SendErrorKind.Cancelled, 'Send was cancelled')
  }

  private constructor(kind: SendErrorKind, message: string, poisonReason?: string) {
    super(message)
    this.name = 'SendError'
    this._kind = kind
    this._poisonReason = poisonReason
  }

  kind(): SendErrorKind {
    return this._kind
  }

  /**
   * Returns the reason of the failure that poisoned the actor.
   * @returns The reason for a Poisoned error, otherwise undefined
   */
  poisonReason(): string | undefined {
    return this._poisonReason
  }
}

/**
 * Result of enqueueing a task. Acceptance says nothing about whether
 * the task will later succeed.
 */
export type SendResult =
  | { readonly accepted: true }
  | { readonly accepted: false; readonly error: SendError }

export const Accepted: SendResult = { accepted: true }

export function refused(error: SendError): SendResult {
  return { accepted: false, error }
}
