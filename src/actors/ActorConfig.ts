// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { Logger } from './Logger.js'
import type { Mailbox } from './Mailbox.js'

/**
 * What a send does once the actor is poisoned.
 */
export enum PoisonedSendPolicy {
  /**
   * The task is still enqueued, and the execution loop answers it
   * with a Poisoned outcome without running it.
   */
  EnqueueThenReject,

  /**
   * The send fails fast: send() is refused with SendErrorKind.Poisoned
   * and sendAndWait() answers Poisoned without touching the mailbox.
   */
  RejectAtSend
}

/**
 * How an actor stops.
 */
export enum ShutdownMode {
  /** Refuse new tasks, run (or poison-reject) every queued task, then stop. */
  Graceful,

  /** Refuse new tasks, answer every queued task with Shutdown, then stop. */
  Immediate
}

/**
 * Options accepted by Stage.spawn(). Omitted options take the values in
 * ActorConfigs.DEFAULT, the stage's logger, and a new ArrayMailbox.
 */
export interface ActorOptions {
  /** Name used in log lines and dead letters */
  name?: string

  /** Mailbox for this actor; must not be shared with another actor */
  mailbox?: Mailbox

  poisonedSendPolicy?: PoisonedSendPolicy

  /** Applied when the last handle is released */
  shutdownMode?: ShutdownMode

  logger?: Logger
}

/**
 * Resolved actor settings.
 */
export interface ActorConfig {
  readonly name: string
  readonly poisonedSendPolicy: PoisonedSendPolicy
  readonly shutdownMode: ShutdownMode
}

/**
 * Predefined actor configurations.
 */
export class ActorConfigs {
  /**
   * Default configuration: poisoned sends are enqueued then rejected,
   * and releasing the last handle drains the mailbox.
   */
  static readonly DEFAULT: ActorConfig = {
    name: 'actor',
    poisonedSendPolicy: PoisonedSendPolicy.EnqueueThenReject,
    shutdownMode: ShutdownMode.Graceful
  }

  /**
   * Merges options over DEFAULT.
   * @param options The options given to spawn()
   * @returns The resolved configuration
   */
  static from(options: ActorOptions): ActorConfig {
    return {
      name: options.name ?? ActorConfigs.DEFAULT.name,
      poisonedSendPolicy: options.poisonedSendPolicy ?? ActorConfigs.DEFAULT.poisonedSendPolicy,
      shutdownMode: options.shutdownMode ?? ActorConfigs.DEFAULT.shutdownMode
    }
  }
}
