import { DecodeError } from '@rail-trace/domain';
import { isJsonObject, jsonKindOf } from './json-kind.js';
import type { JsonObject } from './json-kind.js';

/**
 * Typed reader for one JSON property value. `read` returns `undefined` when
 * the value has the wrong kind; `expected` names the kind in the error.
 */
export interface PropertyReader<T> {
  readonly expected: string;
  read(value: unknown): T | undefined;
}

export const asString: PropertyReader<string> = {
  expected: 'string',
  read: (value) => (typeof value === 'string' ? value : undefined),
};

export const asInteger: PropertyReader<number> = {
  expected: 'integer',
  read: (value) => (typeof value === 'number' && Number.isInteger(value) ? value : undefined),
};

export const asBoolean: PropertyReader<boolean> = {
  expected: 'boolean',
  read: (value) => (typeof value === 'boolean' ? value : undefined),
};

/** Wraps a JSON object value; anything else is an `incorrect-type` error. */
export function toPropertyBag(value: unknown): PropertyBag {
  if (!isJsonObject(value)) throw DecodeError.incorrectType('object', jsonKindOf(value));
  return new PropertyBag(value);
}

/**
 * Field accessor over a JSON property map. Every accessor throws
 * DecodeError; callers convert to a Result at the decoder boundary.
 *
 * - required: missing → `missing-property`; present with the wrong kind (null included) → `incorrect-value-type`
 * - optional: missing or null → `undefined`; wrong kind → `incorrect-value-type`
 * - flag: missing or wrong kind → `false`
 */
export class PropertyBag {
  constructor(private readonly properties: JsonObject) {}

  has(name: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.properties, name);
  }

  required<T>(name: string, reader: PropertyReader<T>): T {
    return this.requiredWith(name, (value) => convert(value, reader));
  }

  optional<T>(name: string, reader: PropertyReader<T>): T | undefined {
    return this.optionalWith(name, (value) => convert(value, reader));
  }

  /** Like `required`, but the value is handed to a nested decoder. */
  requiredWith<T>(name: string, decode: (value: unknown) => T): T {
    if (!this.has(name)) throw DecodeError.missingProperty(name);
    return decode(this.properties[name]);
  }

  optionalWith<T>(name: string, decode: (value: unknown) => T): T | undefined {
    const value = this.has(name) ? this.properties[name] : undefined;
    if (value === undefined || value === null) return undefined;
    return decode(value);
  }

  flag(name: string): boolean {
    return this.has(name) ? asBoolean.read(this.properties[name]) ?? false : false;
  }
}

function convert<T>(value: unknown, reader: PropertyReader<T>): T {
  const result = reader.read(value);
  if (result === undefined) {
    throw DecodeError.incorrectValueType(reader.expected, JSON.stringify(value), jsonKindOf(value));
  }
  return result;
}
