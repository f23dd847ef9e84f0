// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { ActorConfigs, ActorOptions, ShutdownMode } from './ActorConfig.js'
import { ActorHandle } from './ActorHandle.js'
import type { Address } from './Address.js'
import { ArrayMailbox } from './ArrayMailbox.js'
import { DeadLetters } from './DeadLetters.js'
import { Directory, DirectoryConfig, DirectoryConfigs } from './Directory.js'
import { Environment } from './Environment.js'
import { DefaultLogger, isolatedLogger, Logger } from './Logger.js'
import type { StageInternal } from './StageInternal.js'
import { Uuid7Address } from './Uuid7Address.js'

/**
 * Local implementation of the Stage runtime.
 *
 * LocalStage provides:
 * - Actor creation: address, environment, mailbox, execution loop
 * - Handle tracking, including handles dropped without release()
 * - A directory of live actors for close()
 * - System services (logging, dead letters)
 *
 * A handle that becomes unreachable without being released is released
 * on the garbage collector's schedule, so an actor whose handles were all
 * dropped eventually stops with its configured shutdown mode. Call
 * release() or stop() for deterministic shutdown.
 */
export class LocalStage implements StageInternal {
  /** Dead letters facility for tasks that never ran */
  private readonly _deadLetters: DeadLetters
  /** Live actors by address */
  private readonly _directory: Directory
  /** Releases handles that were dropped without release() */
  private readonly _droppedHandles: FinalizationRegistry<Environment>
  /** Stage logger, the default for spawned actors */
  private readonly _logger: Logger
  /** Stage logger as used by the stage itself */
  private readonly _log: Logger

  /**
   * Creates a new local stage.
   *
   * @param logger Logger for the stage and the default for its actors
   * @param directoryConfig Sizing of the live-actor directory
   */
  constructor(logger: Logger = DefaultLogger, directoryConfig: DirectoryConfig = DirectoryConfigs.DEFAULT) {
    this._logger = logger
    this._log = isolatedLogger(logger)
    this._deadLetters = new DeadLetters()
    this._directory = new Directory(directoryConfig)
    this._droppedHandles = new FinalizationRegistry<Environment>(environment => {
      this.releaseDropped(environment).catch((error: unknown) => {
        const errorObj = error instanceof Error ? error : new Error(String(error))
        this._log.error(`${environment} stop after dropped handles failed: ${errorObj.message}`, errorObj)
      })
    })
  }

  spawn(options: ActorOptions = {}): ActorHandle {
    const config = ActorConfigs.from(options)
    const address = Uuid7Address.unique()

    const environment = new Environment(
      this,
      address,
      config,
      options.mailbox ?? new ArrayMailbox(),
      options.logger ?? this._logger
    )

    this._directory.set(address, environment)

    environment.start()

    return this.handleFor(environment)
  }

  handleFor(environment: Environment): ActorHandle {
    const handle = new ActorHandle(environment)
    this._droppedHandles.register(handle, environment, handle)
    return handle
  }

  forgetHandle(handle: ActorHandle): void {
    this._droppedHandles.unregister(handle)
  }

  removeFromDirectory(address: Address): void {
    this._directory.remove(address)
  }

  actorCount(): number {
    return this._directory.size()
  }

  deadLetters(): DeadLetters {
    return this._deadLetters
  }

  logger(): Logger {
    return this._logger
  }

  async close(): Promise<void> {
    const environments = this._directory.all()

    this._log.debug(`Stage closing ${environments.length} actor(s)`)

    await Promise.all(environments.map(environment => environment.stop(ShutdownMode.Graceful)))
  }

  /**
   * Accounts for a handle collected without release(). Called by the
   * finalization registry; the last dropped handle stops the actor with
   * its configured shutdown mode.
   *
   * @internal
   * @returns Promise that resolves when this release is done
   */
  releaseDropped(environment: Environment): Promise<void> {
    if (environment.releaseHandle() > 0) {
      return Promise.resolve()
    }

    return environment.stop(environment.shutdownMode())
  }
}
