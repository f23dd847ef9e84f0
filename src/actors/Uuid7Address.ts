// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { uuidv7 } from 'uuidv7'
import type { Address } from './Address.js'

/**
 * UUIDv7 address implementation.
 *
 * Generates unique, time-sortable addresses using the UUIDv7 standard (RFC 9562),
 * so actors spawned later sort after actors spawned earlier in log output.
 *
 * @example
 * ```typescript
 * const address = Uuid7Address.unique()  // "018e6c7e-8e7a-7c3e-9f1a-3b2c1d0e0f1a"
 * ```
 */
export class Uuid7Address implements Address {
  private readonly _value: string

  /**
   * Generates a new unique UUIDv7 address.
   * @returns A new address
   */
  static unique(): Address {
    return new Uuid7Address(uuidv7())
  }

  private constructor(value: string) {
    this._value = value
  }

  valueAsString(): string {
    return this._value
  }

  equals(other: Address): boolean {
    return this.valueAsString() === other.valueAsString()
  }

  /**
   * Returns a hash code based on the UUIDv7 string.
   * @returns Positive 32-bit hash code
   */
  hashCode(): number {
    const str = this._value
    let hash = 0
    for (let i = 0; i < str.length; i++) {
      hash = ((hash << 5) - hash) + str.charCodeAt(i)
      hash = hash & hash // 32-bit
    }
    return Math.abs(hash)
  }

  toString(): string {
    return 'Address: ' + this._value
  }
}
