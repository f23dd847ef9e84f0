// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { ActorHandle } from './ActorHandle.js'
import type { Address } from './Address.js'
import type { Environment } from './Environment.js'
import type { Stage } from './Stage.js'

/**
 * Internal Stage interface with methods that should not be exposed to clients.
 *
 * Used by Environment and ActorHandle; clients only see Stage.
 */
export interface StageInternal extends Stage {
  /**
   * Creates a new live handle to an existing actor.
   * Used by ActorHandle.clone().
   *
   * @internal
   */
  handleFor(environment: Environment): ActorHandle

  /**
   * Stops tracking a handle that was released explicitly.
   * Called by ActorHandle.release().
   *
   * @internal
   */
  forgetHandle(handle: ActorHandle): void

  /**
   * Removes an actor from the directory once its loop has terminated.
   * Called by Environment during stop.
   *
   * @internal
   */
  removeFromDirectory(address: Address): void
}
