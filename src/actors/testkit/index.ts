// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

export { Gate } from './Gate.js'
export { awaitAssert, delay } from './TestAwaitAssist.js'
export type { AwaitOptions } from './TestAwaitAssist.js'
export { TestDeadLettersListener } from './TestDeadLettersListener.js'
export { TestLogger } from './TestLogger.js'
export type { LogEntry, LogLevel } from './TestLogger.js'
