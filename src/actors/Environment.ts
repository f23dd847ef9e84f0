// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { ActorConfig, PoisonedSendPolicy, ShutdownMode } from './ActorConfig.js'
import { ActorState, ActorStateView } from './ActorState.js'
import type { Address } from './Address.js'
import { ExecutionLoop } from './ExecutionLoop.js'
import { isolatedLogger, Logger } from './Logger.js'
import type { Mailbox } from './Mailbox.js'
import type { StageInternal } from './StageInternal.js'

/**
 * Runtime context and resources of one actor, shared by all its handles.
 *
 * Environment holds:
 * - Address and name (identity)
 * - Mailbox and execution loop (serialized task execution)
 * - Actor state (Running or Poisoned)
 * - Logger and stage (services)
 * - The count of live handles (lifetime)
 *
 * Created by the stage when an actor is spawned. Handles carry nothing
 * but a reference to their Environment.
 */
export class Environment {
  private readonly _address: Address
  private readonly _config: ActorConfig
  private readonly _logger: Logger
  private readonly _loop: ExecutionLoop
  private readonly _mailbox: Mailbox
  private readonly _stage: StageInternal
  private readonly _state: ActorState
  private _handleCount: number = 0
  private _stopped: Promise<void> | undefined = undefined

  /**
   * Creates a new actor environment.
   * Typically called by the stage during spawn.
   *
   * @param stage The stage managing this actor
   * @param address The actor's unique address
   * @param config The actor's resolved configuration
   * @param mailbox The task queue for this actor
   * @param logger The logger for this actor
   */
  constructor(
    stage: StageInternal,
    address: Address,
    config: ActorConfig,
    mailbox: Mailbox,
    logger: Logger
  ) {
    this._stage = stage
    this._address = address
    this._config = config
    this._mailbox = mailbox
    this._logger = isolatedLogger(logger)
    this._state = new ActorState()
    this._loop = new ExecutionLoop(this, this._state)
  }

  address(): Address {
    return this._address
  }

  name(): string {
    return this._config.name
  }

  logger(): Logger {
    return this._logger
  }

  mailbox(): Mailbox {
    return this._mailbox
  }

  /**
   * Returns the actor's state, read-only.
   */
  state(): ActorStateView {
    return this._state
  }

  stage(): StageInternal {
    return this._stage
  }

  poisonedSendPolicy(): PoisonedSendPolicy {
    return this._config.poisonedSendPolicy
  }

  shutdownMode(): ShutdownMode {
    return this._config.shutdownMode
  }

  /**
   * Starts the execution loop.
   */
  start(): void {
    this._loop.start()
    this._logger.debug(`${this} subject: start()`)
  }

  /**
   * Records one more live handle.
   * @returns The number of live handles
   */
  retainHandle(): number {
    return ++this._handleCount
  }

  /**
   * Records one handle fewer.
   * @returns The number of live handles left
   */
  releaseHandle(): number {
    if (this._handleCount > 0) {
      this._handleCount--
    }
    return this._handleCount
  }

  handleCount(): number {
    return this._handleCount
  }

  /**
   * Stops the actor.
   *
   * Closes the mailbox so that new sends are refused with Closed. Graceful
   * lets the loop work through what is queued; Immediate answers every
   * queued task with Shutdown. Calling stop() again is safe, and a later
   * Immediate still rejects what a Graceful stop left queued.
   *
   * @param mode Graceful or Immediate
   * @returns Promise that resolves when the execution loop has terminated
   */
  stop(mode: ShutdownMode): Promise<void> {
    if (!this._mailbox.isClosed()) {
      this._logger.log(`${this} subject: stop(${ShutdownMode[mode]})`)
      this._mailbox.close()
    }

    if (mode === ShutdownMode.Immediate) {
      this._loop.stopImmediately()
    }

    if (!this._stopped) {
      this._stopped = this._loop.terminated().then(() => {
        this._stage.removeFromDirectory(this._address)
        this._logger.debug(`${this} subject: stopped`)
      })
    }

    return this._stopped
  }

  /**
   * Returns whether the actor refuses new tasks.
   * A stopped actor's mailbox is closed; queued tasks may still be running.
   */
  isStopped(): boolean {
    return this._mailbox.isClosed()
  }

  /**
   * Returns whether a task of this actor is running right now.
   */
  isExecuting(): boolean {
    return this._loop.isExecuting()
  }

  toString(): string {
    return 'Actor: ' + this.name() + ' At: ' + this._address.valueAsString()
  }
}
