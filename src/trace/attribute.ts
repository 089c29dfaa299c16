/**
 * Span attribute values
 *
 * An attribute value is one of string, bool, signed 64-bit integer or double.
 * Plain JS primitives are accepted at the API surface and mapped onto that
 * union by `toAttributeValue`.
 */

import { FrozenMap } from './evicting-buffer.js';

// =============================================================================
// Types
// =============================================================================

export type AttributeValue =
  | { readonly type: 'string'; readonly value: string }
  | { readonly type: 'bool'; readonly value: boolean }
  | { readonly type: 'int'; readonly value: bigint }
  | { readonly type: 'double'; readonly value: number };

export type AttributeType = AttributeValue['type'];

/**
 * What callers may pass as an attribute value.
 */
export type AttributeInput = string | boolean | number | bigint | AttributeValue;

/**
 * A batch of attributes: ordered key/value pairs or a plain record.
 * Later entries win over earlier ones with the same key.
 */
export type AttributeList =
  | ReadonlyArray<readonly [string, AttributeInput]>
  | Readonly<Record<string, AttributeInput>>;

// =============================================================================
// Constructors
// =============================================================================

export const AttributeValue = {
  string(value: string): AttributeValue {
    return Object.freeze({ type: 'string', value });
  },

  bool(value: boolean): AttributeValue {
    return Object.freeze({ type: 'bool', value });
  },

  /**
   * Signed 64-bit integer. Values outside the range wrap. NaN and the
   * infinities have no integer form and become a double.
   */
  int(value: bigint | number): AttributeValue {
    if (typeof value === 'number' && !Number.isFinite(value)) {
      return AttributeValue.double(value);
    }
    const big = typeof value === 'bigint' ? value : BigInt(Math.trunc(value));
    return Object.freeze({ type: 'int', value: BigInt.asIntN(64, big) });
  },

  double(value: number): AttributeValue {
    return Object.freeze({ type: 'double', value });
  },
} as const;

// =============================================================================
// Conversion
// =============================================================================

/**
 * Maps a caller-supplied value onto the attribute union.
 *
 * Integral numbers inside the safe-integer range become `int`; every other
 * number becomes `double`. Use `AttributeValue.double` to force a double.
 */
export function toAttributeValue(input: AttributeInput): AttributeValue {
  switch (typeof input) {
    case 'string':
      return AttributeValue.string(input);
    case 'boolean':
      return AttributeValue.bool(input);
    case 'bigint':
      return AttributeValue.int(input);
    case 'number':
      return Number.isSafeInteger(input) ? AttributeValue.int(input) : AttributeValue.double(input);
    default:
      return input;
  }
}

/**
 * Normalizes a batch into ordered `[key, AttributeValue]` pairs.
 */
export function toAttributeEntries(attributes: AttributeList | undefined): Array<[string, AttributeValue]> {
  if (attributes === undefined) {
    return [];
  }
  const pairs: ReadonlyArray<readonly [string, AttributeInput]> = isPairList(attributes)
    ? attributes
    : Object.entries(attributes);
  return pairs.map(([key, value]) => [key, toAttributeValue(value)]);
}

function isPairList(
  attributes: AttributeList
): attributes is ReadonlyArray<readonly [string, AttributeInput]> {
  return Array.isArray(attributes);
}

/**
 * Builds the attribute set attached to an annotation or link.
 */
export function toAttributeMap(attributes: AttributeList | undefined): ReadonlyMap<string, AttributeValue> {
  return new FrozenMap(toAttributeEntries(attributes));
}

