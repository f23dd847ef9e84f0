// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { Mailbox, SendOptions } from './Mailbox.js'
import { Message, EmptyMessage } from './Message.js'
import { OverflowPolicy } from './OverflowPolicy.js'
import { Accepted, refused, SendError, SendResult } from './SendError.js'

/**
 * A sender waiting for space under OverflowPolicy.Block.
 */
interface WaitingSend {
  message: Message
  settle(result: SendResult): void
}

/**
 * A bounded mailbox with configurable capacity and overflow handling.
 * Limits the number of queued messages and applies backpressure to producers.
 *
 * When the mailbox is at capacity, the overflow policy determines what happens:
 * - Block: The sender waits until the execution loop frees space
 * - Reject: The send is refused with QueueFull
 *
 * Waiting senders are admitted strictly in arrival order, and a new send
 * never overtakes a waiting one.
 */
export class BoundedMailbox implements Mailbox {
  private closed: boolean
  private queue: Message[]
  private waiting: WaitingSend[]
  private receiver: ((message: Message) => void) | undefined
  private readonly _capacity: number
  private readonly overflowPolicy: OverflowPolicy
  private _rejectedCount: number = 0

  /**
   * Creates a bounded mailbox with the specified capacity and overflow policy.
   *
   * @param capacity Maximum number of messages that can be queued
   * @param overflowPolicy How to handle sends when at capacity
   * @throws Error if capacity is not positive
   * @example
   * ```typescript
   * // Senders wait for space
   * const mailbox = new BoundedMailbox(100)
   *
   * // Senders are refused with QueueFull when full
   * const mailbox = new BoundedMailbox(50, OverflowPolicy.Reject)
   * ```
   */
  constructor(capacity: number, overflowPolicy: OverflowPolicy = OverflowPolicy.Block) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error('Mailbox capacity must be positive')
    }
    this._capacity = capacity
    this.overflowPolicy = overflowPolicy
    this.closed = false
    this.queue = []
    this.waiting = []
    this.receiver = undefined
  }

  /**
   * Closes the mailbox.
   * Waiting senders are refused with Closed; queued messages remain receivable.
   */
  close(): void {
    this.closed = true

    const waiting = this.waiting
    this.waiting = []
    waiting.forEach(waiter => waiter.settle(refused(SendError.closed())))

    this.wakeReceiver()
  }

  isClosed(): boolean {
    return this.closed
  }

  /**
   * Sends a message to the mailbox, applying the overflow policy if at capacity.
   *
   * Behavior:
   * - If closed: refuses with Closed
   * - If space and nobody waiting: queues the message immediately
   * - If at capacity with Reject: refuses with QueueFull
   * - If at capacity with Block: waits for space, timeout, or abort
   *
   * @param message The message to send
   * @param options Timeout and abort signal for a waiting send
   * @returns Promise resolving to the send result
   */
  send(message: Message, options: SendOptions = {}): Promise<SendResult> {
    if (this.isClosed()) {
      return Promise.resolve(refused(SendError.closed()))
    }

    if (!this.isFull() && this.waiting.length === 0) {
      this.queue.push(message)
      this.wakeReceiver()
      return Promise.resolve(Accepted)
    }

    if (this.overflowPolicy === OverflowPolicy.Reject) {
      this._rejectedCount++
      return Promise.resolve(refused(SendError.queueFull()))
    }

    return this.waitForSpace(message, options)
  }

  /**
   * Dequeues the next message, waiting while the queue is empty.
   * Frees space for waiting senders.
   *
   * @returns The next message, or EmptyMessage once closed and drained
   */
  receive(): Promise<Message> {
    const maybeMessage = this.queue.shift()

    if (maybeMessage) {
      this.admitWaiting()
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
    this.admitWaiting()
    return drained
  }

  isReceivable(): boolean {
    return this.queue.length > 0
  }

  size(): number {
    return this.queue.length
  }

  /**
   * Returns the maximum capacity of this mailbox.
   */
  capacity(): number {
    return this._capacity
  }

  /**
   * Returns whether the mailbox is at capacity.
   */
  isFull(): boolean {
    return this.queue.length >= this._capacity
  }

  /**
   * Returns the number of senders currently waiting for space.
   */
  waitingCount(): number {
    return this.waiting.length
  }

  /**
   * Returns the number of sends refused with QueueFull since creation,
   * whether by the Reject policy or by a waiting send timing out.
   */
  rejectedCount(): number {
    return this._rejectedCount
  }

  /**
   * Parks a send until space frees. Timeout and abort withdraw the
   * waiter synchronously, so a withdrawn message is never queued.
   */
  private waitForSpace(message: Message, options: SendOptions): Promise<SendResult> {
    const { timeout, signal } = options

    if (signal?.aborted) {
      return Promise.resolve(refused(SendError.cancelled()))
    }

    return new Promise<SendResult>(resolve => {
      let timer: ReturnType<typeof setTimeout> | undefined = undefined

      const onAbort = (): void => {
        this.withdraw(waiter, SendError.cancelled())
      }

      const waiter: WaitingSend = {
        message,
        settle(result: SendResult): void {
          if (timer !== undefined) {
            clearTimeout(timer)
          }
          signal?.removeEventListener('abort', onAbort)
          resolve(result)
        }
      }

      if (timeout !== undefined) {
        timer = setTimeout(() => {
          this._rejectedCount++
          this.withdraw(waiter, SendError.queueFull())
        }, timeout)
      }

      signal?.addEventListener('abort', onAbort, { once: true })

      this.waiting.push(waiter)
    })
  }

  private withdraw(waiter: WaitingSend, error: SendError): void {
    const index = this.waiting.indexOf(waiter)
    if (index !== -1) {
      this.waiting.splice(index, 1)
      waiter.settle(refused(error))
    }
  }

  /**
   * Moves waiting senders into the queue, oldest first, while space lasts.
   */
  private admitWaiting(): void {
    while (!this.isFull()) {
      const waiter = this.waiting.shift()
      if (!waiter) {
        return
      }
      this.queue.push(waiter.message)
      waiter.settle(Accepted)
    }
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
      this.admitWaiting()
      receiver(maybeMessage)
    } else if (this.isClosed()) {
      this.receiver = undefined
      receiver(EmptyMessage)
    }
  }
}
