// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * Logging facility used by the stage, actors, and dead letters.
 *
 * The runtime never writes to the console directly; it always goes
 * through a Logger so that applications and tests can redirect output.
 */
export interface Logger {
  /**
   * Logs an informational message.
   * @param message The message to log
   * @param args Additional values to log with the message
   */
  log(message: string, ...args: unknown[]): void

  /**
   * Logs a diagnostic message.
   * @param message The message to log
   * @param args Additional values to log with the message
   */
  debug(message: string, ...args: unknown[]): void

  /**
   * Logs an error message.
   * @param message The message to log
   * @param args Additional values to log with the message, typically an Error
   */
  error(message: string, ...args: unknown[]): void
}

/**
 * Console-backed logger used when no other logger is given.
 */
export const DefaultLogger: Logger = {
  log(message: string, ...args: unknown[]): void {
    console.log(message, ...args)
  },

  debug(message: string, ...args: unknown[]): void {
    console.debug(message, ...args)
  },

  error(message: string, ...args: unknown[]): void {
    console.error(message, ...args)
  }
}

/**
 * Logger that discards everything.
 */
export const SilentLogger: Logger = {
  log(): void {},
  debug(): void {},
  error(): void {}
}

/**
 * Wraps a logger so that an exception thrown by it is reported to
 * DefaultLogger instead of reaching the caller. The runtime logs through
 * an isolated logger from inside the execution loop and the send path.
 * @param logger The logger to wrap
 * @returns A logger that never throws
 */
export function isolatedLogger(logger: Logger): Logger {
  const guard = (write: () => void): void => {
    try {
      write()
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error)
      DefaultLogger.error('Logger crashed because: ' + message, error)
    }
  }

  return {
    log(message: string, ...args: unknown[]): void {
      guard(() => logger.log(message, ...args))
    },

    debug(message: string, ...args: unknown[]): void {
      guard(() => logger.debug(message, ...args))
    },

    error(message: string, ...args: unknown[]): void {
      guard(() => logger.error(message, ...args))
    }
  }
}
