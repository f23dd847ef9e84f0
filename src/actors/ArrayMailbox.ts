// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { Mailbox } from './Mailbox.js'
import { Message, EmptyMessage } from './Message.js'
import { Accepted, refused, SendError, SendResult } from './SendError.js'

/**
 * Unbounded FIFO mailbox implementation using JavaScript arrays.
 *
 * Provides:
 * - Unlimited queue capacity, so send() never waits
 * - First-in-first-out delivery
 * - A single suspended receiver, woken by the next send or by close()
 *
 * Default mailbox used by the stage when no custom mailbox is specified.
 * For capacity-limited queues with backpressure, see BoundedMailbox.
 */
export class ArrayMailbox implements Mailbox {
  private closed: boolean
  private queue: Message[]
  private receiver: ((message: Message) => void) | undefined

  /**
   * Creates a new unbounded array mailbox in the open state.
   */
  constructor() {
    this.closed = false
    this.queue = []
    this.receiver = undefined
  }

  /**
   * Closes the mailbox. An idle receiver is woken with EmptyMessage;
   * queued messages remain receivable.
   */
  close(): void {
    this.closed = true
    this.wakeReceiver()
  }

  isClosed(): boolean {
    return this.closed
  }

  /**
   * Enqueues a message for delivery.
   *
   * Behavior:
   * - If closed: refuses with Closed
   * - Otherwise: queues the message and hands it to an idle receiver
   *
   * @param message The message to send
   * @returns Promise resolving to the send result
   */
  send(message: Message): Promise<SendResult> {
    if (this.isClosed()) {
      return Promise.resolve(refused(SendError.closed()))
    }

    this.queue.push(message)
    this.wakeReceiver()

    return Promise.resolve(Accepted)
  }

  /**
   * Dequeues the next message, waiting while the queue is empty.
   *
   * @returns The next message, or EmptyMessage once closed and drained
   */
  receive(): Promise<Message> {
    const maybeMessage = this.queue.shift()

    if (maybeMessage) {
      return Promise.resolve(maybeMessage)
    }

    if (this.isClosed()) {
      return Promise.resolve(EmptyMessage)
    }

    return new Promise<Message>(resolve => {
      this.receiver = resolve
    })
  }

  drain(): Message[] {
    const drained = this.queue
    this.queue = []
    return drained
  }

  isReceivable(): boolean {
    return this.queue.length > 0
  }

  size(): number {
    return this.queue.length
  }

  /**
   * Hands the next message, or EmptyMessage when closed and empty,
   * to a receiver suspended in receive().
   */
  private wakeReceiver(): void {
    const receiver = this.receiver

    if (!receiver) {
      return
    }

    const maybeMessage = this.queue.shift()

    if (maybeMessage) {
      this.receiver = undefined
      receiver(maybeMessage)
    } else if (this.isClosed()) {
      this.receiver = undefined
      receiver(EmptyMessage)
    }
  }
}
