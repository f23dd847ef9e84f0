// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { ActorHandle } from './ActorHandle.js'
import type { ActorOptions } from './ActorConfig.js'
import type { DeadLetters } from './DeadLetters.js'
import { LocalStage } from './LocalStage.js'
import type { Logger } from './Logger.js'

/**
 * Main entry point and runtime environment for actors.
 *
 * The Stage:
 * - Spawns actors and hands out their first handle
 * - Tracks live actors until they stop
 * - Provides system-wide services (logging, dead letters)
 *
 * Get the default stage via the stage() factory function, or construct
 * a LocalStage for an isolated set of actors:
 * ```typescript
 * const account = stage().spawn({ name: 'account' })
 * await account.send(() => { balance += 10; return ok() })
 * ```
 */
export interface Stage {
  /**
   * Creates a new actor with an empty mailbox in Running state, starts
   * its execution loop, and returns the first handle to it.
   *
   * @param options Name, mailbox, policies, and logger for the actor
   * @returns Handle to the new actor
   */
  spawn(options?: ActorOptions): ActorHandle

  /**
   * Returns the number of actors whose execution loop has not terminated.
   */
  actorCount(): number

  /**
   * Returns the dead letters facility for tasks that never ran.
   */
  deadLetters(): DeadLetters

  /**
   * Returns the stage's logger, the default for spawned actors.
   */
  logger(): Logger

  /**
   * Stops every live actor gracefully.
   * @returns Promise that resolves when every execution loop has terminated
   */
  close(): Promise<void>
}

/**
 * Singleton stage instance initialized on module load.
 */
const _stage = new LocalStage()

/**
 * Returns the default stage instance.
 *
 * @returns The default stage instance
 */
export const stage = (): Stage => {
  return _stage
}

/**
 * Spawns an actor on the default stage.
 *
 * @param options Name, mailbox, policies, and logger for the actor
 * @returns Handle to the new actor
 */
export const spawn = (options?: ActorOptions): ActorHandle => {
  return _stage.spawn(options)
}
