// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * Successful result of a task, optionally carrying a value.
 */
export interface Ok<T> {
  readonly ok: true
  readonly value: T
}

/**
 * Failed result of a task. A failure poisons the actor that ran it.
 */
export interface Err {
  readonly ok: false
  readonly reason: string
}

/**
 * The result a task reports when it is invoked.
 */
export type TaskResult<T = void> = Ok<T> | Err

/**
 * A deferred unit of work submitted to an actor.
 *
 * The task runs on the actor's execution loop, never concurrently with
 * another task of the same actor. An asynchronous task is awaited to
 * completion before the next task starts. A task that throws, or whose
 * promise rejects, is treated as a failed task.
 *
 * A task must not submit-and-wait on the actor that runs it: the reply
 * could only be produced after the task itself finished.
 *
 * @example
 * ```typescript
 * const increment: Task = () => {
 *   count++
 *   return ok()
 * }
 *
 * const read: Task<number> = () => ok(count)
 * ```
 */
export type Task<T = void> = () => TaskResult<T> | Promise<TaskResult<T>>

/**
 * Answers a successful task result.
 * @param value The value carried back to a submit-and-wait caller
 * @returns The result
 */
export function ok(): Ok<void>
export function ok<T>(value: T): Ok<T>
export function ok(value?: unknown): Ok<unknown> {
  return { ok: true, value }
}

/**
 * Answers a failed task result.
 * @param reason Why the task failed; an Error contributes its message
 * @returns The result
 */
export function err(reason: string | Error): Err {
  return { ok: false, reason: reason instanceof Error ? reason.message : reason }
}
