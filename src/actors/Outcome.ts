// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { SendError } from './SendError.js'

/** The task ran and reported success. */
export interface Success<T> {
  readonly status: 'success'
  readonly value: T
}

/** The task ran and reported failure; the actor is now poisoned. */
export interface Failure {
  readonly status: 'failure'
  readonly reason: string
}

/** The task never ran because an earlier task poisoned the actor. */
export interface Poisoned {
  readonly status: 'poisoned'
  /** Reason reported by the task that poisoned the actor */
  readonly reason: string
}

/** The task never ran because the actor was stopped. */
export interface Shutdown {
  readonly status: 'shutdown'
}

/** The task was never accepted into the mailbox. */
export interface Rejected {
  readonly status: 'rejected'
  readonly error: SendError
}

/** The caller stopped waiting; the task may still run. */
export interface Abandoned {
  readonly status: 'abandoned'
}

/**
 * What a submit-and-wait caller observes, exactly once per submission.
 */
export type Outcome<T = void> = Success<T> | Failure | Poisoned | Shutdown | Rejected | Abandoned

/**
 * Outcome written by the execution loop after running a task.
 */
export type Completion<T> = Success<T> | Failure

/**
 * Outcome written for a task that was accepted but never ran.
 */
export type Undelivered = Poisoned | Shutdown

export function success<T>(value: T): Success<T> {
  return { status: 'success', value }
}

export function failure(reason: string): Failure {
  return { status: 'failure', reason }
}

export function poisoned(reason: string): Poisoned {
  return { status: 'poisoned', reason }
}

export function shutdown(): Shutdown {
  return { status: 'shutdown' }
}

export function rejected(error: SendError): Rejected {
  return { status: 'rejected', error }
}

export function abandoned(): Abandoned {
  return { status: 'abandoned' }
}

/**
 * Describes an outcome for logs and dead letters.
 * @param outcome The outcome to describe
 * @returns e.g. "poisoned: disk full"
 */
export function describeOutcome<T>(outcome: Outcome<T>): string {
  switch (outcome.status) {
    case 'success':
    case 'shutdown':
    case 'abandoned':
      return outcome.status
    case 'failure':
    case 'poisoned':
      return `${outcome.status}: ${outcome.reason}`
    case 'rejected':
      return `rejected: ${outcome.error.message}`
  }
}
