// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * What a BoundedMailbox does with a send that finds it at capacity.
 */
export enum OverflowPolicy {
  /**
   * Backpressure: the sender waits, in arrival order, until space frees,
   * its timeout elapses (QueueFull), or its signal aborts (Cancelled).
   */
  Block,

  /** The send is refused immediately with QueueFull. */
  Reject
}
