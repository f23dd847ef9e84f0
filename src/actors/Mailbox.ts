// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { Message } from './Message.js'
import type { SendResult } from './SendError.js'

/**
 * Options for a single enqueue.
 * Only take effect when the send has to wait for mailbox space.
 */
export interface SendOptions {
  /** Milliseconds to wait for space before giving up with QueueFull */
  timeout?: number

  /** Aborting gives up a waiting send with Cancelled */
  signal?: AbortSignal
}

/**
 * Task queue for an actor: multi-producer, single-consumer, FIFO.
 *
 * Mailboxes provide:
 * - Enqueueing from any number of producers
 * - Suspending receive for the single execution loop
 * - Closing, after which sends are refused and receive drains what is left
 *
 * Implementations:
 * - ArrayMailbox: Unbounded FIFO queue using JavaScript arrays
 * - BoundedMailbox: Capacity-limited queue with backpressure or rejection
 *
 * Key characteristics:
 * - A message accepted by send() is queued before send() returns, so the
 *   order of accepted sends is the order of execution
 * - No message is ever received twice
 * - Closing is distinct from poisoning; a poisoned actor's mailbox stays open
 */
export interface Mailbox {
  /**
   * Closes the mailbox. Subsequent sends are refused with Closed.
   * Already queued messages remain receivable.
   */
  close(): void

  /**
   * Returns whether the mailbox is closed.
   * @returns true if closed, false otherwise
   */
  isClosed(): boolean

  /**
   * Enqueues a message and wakes the execution loop if it is idle.
   * @param message The message to send
   * @param options Waiting limits, for mailboxes that can make senders wait
   * @returns Promise resolving to whether the message was accepted
   */
  send(message: Message, options?: SendOptions): Promise<SendResult>

  /**
   * Dequeues the next message, waiting while the mailbox is empty.
   * Only one receive may be outstanding at a time.
   * @returns The next message, or EmptyMessage once closed and drained
   */
  receive(): Promise<Message>

  /**
   * Removes and returns every queued message without delivering them.
   * Used by immediate shutdown.
   * @returns The removed messages in queue order
   */
  drain(): Message[]

  /**
   * Checks if a message is queued and ready to be received.
   * @returns true if at least one message is queued
   */
  isReceivable(): boolean

  /**
   * Returns the current number of queued messages.
   */
  size(): number
}
