// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { Address } from './Address.js'
import type { Environment } from './Environment.js'

/**
 * Configuration for Directory capacity tuning.
 *
 * Uses an array of Map instances to distribute load; each bucket is independent.
 */
export interface DirectoryConfig {
  /**
   * Number of buckets (shards) for distributing actors.
   * More buckets = better distribution for large actor counts.
   */
  buckets: number
}

/**
 * Predefined directory configurations for common use cases.
 */
export class DirectoryConfigs {
  /** Default configuration: 32 buckets, suitable for most applications. */
  static readonly DEFAULT: DirectoryConfig = {
    buckets: 32
  }

  /** High-capacity configuration: 128 buckets, for very many live actors. */
  static readonly HIGH_CAPACITY: DirectoryConfig = {
    buckets: 128
  }

  /** Small configuration: 4 buckets, for testing or very small applications. */
  static readonly SMALL: DirectoryConfig = {
    buckets: 4
  }
}

/**
 * Sharded directory of the live actors of a stage, keyed by address.
 *
 * An actor is registered when spawned and removed once its execution
 * loop has terminated. The stage uses it to stop every live actor on close().
 *
 * Performance characteristics:
 * - Lookup, insert, remove: O(1) average case
 * - Size and all(): O(buckets + actors)
 */
export class Directory {
  private readonly buckets: Map<string, Environment>[]

  /**
   * Creates a new Directory with the specified configuration.
   *
   * @param config Directory configuration (defaults to DirectoryConfigs.DEFAULT)
   * @throws Error if the bucket count is not positive
   */
  constructor(config: DirectoryConfig = DirectoryConfigs.DEFAULT) {
    if (!Number.isInteger(config.buckets) || config.buckets <= 0) {
      throw new Error('Directory buckets must be positive')
    }

    this.buckets = []

    for (let i = 0; i < config.buckets; i++) {
      this.buckets.push(new Map<string, Environment>())
    }
  }

  set(address: Address, environment: Environment): void {
    this.bucketFor(address).set(address.valueAsString(), environment)
  }

  get(address: Address): Environment | undefined {
    return this.bucketFor(address).get(address.valueAsString())
  }

  /**
   * Removes an actor from the directory.
   *
   * @param address Actor's address
   * @returns true if actor was removed, false if not found
   */
  remove(address: Address): boolean {
    return this.bucketFor(address).delete(address.valueAsString())
  }

  /**
   * Returns the total number of registered actors.
   */
  size(): number {
    let total = 0
    for (const bucket of this.buckets) {
      total += bucket.size
    }
    return total
  }

  /**
   * Returns all registered actors.
   */
  all(): Environment[] {
    const environments: Environment[] = []
    for (const bucket of this.buckets) {
      for (const environment of bucket.values()) {
        environments.push(environment)
      }
    }
    return environments
  }

  /**
   * Determines which bucket an address maps to using modulo hashing.
   */
  private bucketFor(address: Address): Map<string, Environment> {
    const index = Math.abs(address.hashCode()) % this.buckets.length
    const bucket = this.buckets[index]
    if (!bucket) {
      throw new Error(`Directory bucket out of range: ${index}`)
    }
    return bucket
  }
}
