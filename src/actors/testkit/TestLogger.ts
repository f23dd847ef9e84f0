// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { Logger } from '../Logger.js'

export type LogLevel = 'log' | 'debug' | 'error'

export interface LogEntry {
  readonly level: LogLevel
  readonly message: string
}

/**
 * Logger that captures entries in memory for assertions instead of
 * writing to the console.
 */
export class TestLogger implements Logger {
  private entries: LogEntry[] = []

  log(message: string): void {
    this.entries.push({ level: 'log', message })
  }

  debug(message: string): void {
    this.entries.push({ level: 'debug', message })
  }

  error(message: string): void {
    this.entries.push({ level: 'error', message })
  }

  all(): LogEntry[] {
    return [...this.entries]
  }

  /**
   * Returns the messages logged at one level, in order.
   */
  messages(level: LogLevel): string[] {
    return this.entries.filter(entry => entry.level === level).map(entry => entry.message)
  }

  clear(): void {
    this.entries = []
  }
}
