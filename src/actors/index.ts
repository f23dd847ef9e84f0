// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * Serialized task execution: each actor runs the tasks sent to it one at
 * a time, in order, and is poisoned by the first task that fails.
 *
 * @packageDocumentation
 */

// Actors and handles
export { ActorHandle } from './ActorHandle.js'
export type { WaitOptions } from './ActorHandle.js'
export { ActorConfigs, PoisonedSendPolicy, ShutdownMode } from './ActorConfig.js'
export type { ActorConfig, ActorOptions } from './ActorConfig.js'
export { ActorStatus } from './ActorState.js'
export type { ActorStateView } from './ActorState.js'
export type { Address } from './Address.js'
export { spawn, stage } from './Stage.js'
export type { Stage } from './Stage.js'
export { LocalStage } from './LocalStage.js'
export { DirectoryConfigs } from './Directory.js'
export type { DirectoryConfig } from './Directory.js'

// Tasks and outcomes
export { err, ok } from './Task.js'
export type { Err, Ok, Task, TaskResult } from './Task.js'
export { describeOutcome } from './Outcome.js'
export type { Abandoned, Completion, Failure, Outcome, Poisoned, Rejected, Shutdown, Success } from './Outcome.js'
export { Accepted, SendError, SendErrorKind } from './SendError.js'
export type { SendResult } from './SendError.js'

// Mailboxes
export type { Mailbox, SendOptions } from './Mailbox.js'
export { ArrayMailbox } from './ArrayMailbox.js'
export { BoundedMailbox } from './BoundedMailbox.js'
export { OverflowPolicy } from './OverflowPolicy.js'

// Logging and dead letters
export { DefaultLogger, isolatedLogger, SilentLogger } from './Logger.js'
export type { Logger } from './Logger.js'
export { DeadLetter, DeadLetters } from './DeadLetters.js'
export type { DeadLettersListener } from './DeadLetters.js'
