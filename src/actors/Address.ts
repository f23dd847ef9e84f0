// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * Unique identity of an actor.
 *
 * Used in log lines, dead letters, and as the key under which the
 * stage's Directory tracks live actors.
 */
export interface Address {
  /**
   * Returns the address value as a string.
   * @returns String form of the address
   */
  valueAsString(): string

  /**
   * Compares this address with another by value.
   * @param other The address to compare with
   * @returns true if both addresses have the same value
   */
  equals(other: Address): boolean

  /**
   * Returns a non-negative hash code used for Directory sharding.
   * @returns Hash code
   */
  hashCode(): number

  /**
   * Returns a string representation of this address.
   */
  toString(): string
}
