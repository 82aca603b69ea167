import isUUID from 'is-uuid';

import { ValidationError } from './errors.js';

export type ValidatorFunction<TValue> = (value: TValue) => boolean | void;

/**
 * Storage categories the compiler and serializer care about.
 */
export type ColumnKind =
  | 'string'
  | 'number'
  | 'boolean'
  | 'date'
  | 'datetime'
  | 'decimal'
  | 'uuid'
  | 'enum'
  | 'json'
  | 'any';

type SchemaFieldLike = { validate(value: unknown, fieldName?: string): unknown };

/**
 * Structural view of a column type, independent of its value type.
 */
export interface ColumnType extends SchemaFieldLike {
  readonly kind: ColumnKind;
  readonly isRequired: boolean;
  readonly isPrimaryKey: boolean;
  readonly isUnique: boolean;
  readonly hasDefault: boolean;
  getDefault(): unknown;
}

export type InferFieldValue<Field extends SchemaFieldLike> = Field extends {
  validate(value: unknown, fieldName?: string): infer TValue;
}
  ? TValue
  : never;

/**
 * Base column type used for declarative schema definitions.
 */
export class Type<TBase> {
  readonly kind: ColumnKind;
  options: Record<string, unknown>;
  validators: ValidatorFunction<TBase>[];
  isRequired: boolean;
  isPrimaryKey: boolean;
  isUnique: boolean;
  defaultValue?: TBase | null | (() => TBase | null);
  hasDefault: boolean;

  constructor(kind: ColumnKind = 'any', options: Record<string, unknown> = {}) {
    this.kind = kind;
    this.options = options;
    this.validators = [];
    this.isRequired = false;
    this.isPrimaryKey = false;
    this.isUnique = false;
    this.defaultValue = undefined;
    this.hasDefault = false;
  }

  /**
   * Add a validator function that will receive the normalized value.
   */
  validator(validator: ValidatorFunction<TBase>): this {
    this.validators.push(validator);
    return this;
  }

  required(isRequired = true): this {
    this.isRequired = isRequired;
    return this;
  }

  /**
   * Mark the column as the table's primary key. Primary keys are also unique.
   */
  primaryKey(): this {
    this.isPrimaryKey = true;
    this.isUnique = true;
    return this;
  }

  unique(isUnique = true): this {
    this.isUnique = isUnique;
    return this;
  }

  /**
   * Configure a default value (or factory) applied to new entities.
   */
  default(value: TBase | null | (() => TBase | null)): this {
    this.defaultValue = value;
    this.hasDefault = true;
    return this;
  }

  protected runValidators(value: TBase, fieldName: string): void {
    for (const validator of this.validators) {
      try {
        const result = validator(value);
        if (result === false) {
          throw new ValidationError(`Validation failed for ${fieldName}`, fieldName);
        }
      } catch (error) {
        if (error instanceof ValidationError) {
          throw error;
        }
        const message = error instanceof Error ? error.message : String(error);
        throw new ValidationError(`Validation error for ${fieldName}: ${message}`, fieldName);
      }
    }
  }

  /**
   * Narrow a non-null value to the column's base type.
   */
  protected normalize(value: unknown, _fieldName: string): TBase {
    return value as TBase;
  }

  /**
   * Validate the supplied value and return the normalized result.
   */
  validate(value: unknown, fieldName = 'field'): TBase | null {
    if (value === null || value === undefined) {
      if (this.isRequired) {
        throw new ValidationError(`${fieldName} is required`, fieldName);
      }
      return null;
    }

    const normalized = this.normalize(value, fieldName);
    this.runValidators(normalized, fieldName);
    return normalized;
  }

  /**
   * Resolve a configured default for the field, if any.
   */
  getDefault(): TBase | null | undefined {
    if (!this.hasDefault) {
      return undefined;
    }

    if (typeof this.defaultValue === 'function') {
      return (this.defaultValue as () => TBase | null)();
    }

    return this.defaultValue;
  }
}

export class StringType extends Type<string> {
  maxLength: number | null = null;

  constructor(options: Record<string, unknown> = {}) {
    super('string', options);
  }

  max(length: number): this {
    this.maxLength = length;
    return this;
  }

  protected override normalize(value: unknown, fieldName: string): string {
    if (typeof value !== 'string') {
      throw new ValidationError(`${fieldName} must be a string`, fieldName);
    }
    if (this.maxLength !== null && value.length > this.maxLength) {
      throw new ValidationError(
        `${fieldName} must be shorter than ${this.maxLength} characters`,
        fieldName
      );
    }
    return value;
  }
}

export class NumberType extends Type<number> {
  isInteger = false;

  constructor(options: Record<string, unknown> = {}) {
    super('number', options);
  }

  integer(): this {
    this.isInteger = true;
    return this;
  }

  protected override normalize(value: unknown, fieldName: string): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new ValidationError(`${fieldName} must be a finite number`, fieldName);
    }
    if (this.isInteger && !Number.isInteger(value)) {
      throw new ValidationError(`${fieldName} must be an integer`, fieldName);
    }
    return value;
  }
}

export class BooleanType extends Type<boolean> {
  constructor(options: Record<string, unknown> = {}) {
    super('boolean', options);
  }

  protected override normalize(value: unknown, fieldName: string): boolean {
    if (typeof value !== 'boolean') {
      throw new ValidationError(`${fieldName} must be a boolean`, fieldName);
    }
    return value;
  }
}

/**
 * Calendar date (`date`) or timestamp (`datetime`) column. Strings are parsed.
 */
export class DateType extends Type<Date> {
  constructor(kind: 'date' | 'datetime', options: Record<string, unknown> = {}) {
    super(kind, options);
  }

  protected override normalize(value: unknown, fieldName: string): Date {
    const normalized =
      value instanceof Date ? value : typeof value === 'string' ? new Date(value) : null;
    if (!normalized || Number.isNaN(normalized.getTime())) {
      throw new ValidationError(`${fieldName} must be a valid date`, fieldName);
    }
    return normalized;
  }
}

/**
 * Fixed-point NUMERIC column. `pg` hands these back as strings to keep precision.
 */
export class DecimalType extends Type<string> {
  constructor(options: Record<string, unknown> = {}) {
    super('decimal', options);
  }

  protected override normalize(value: unknown, fieldName: string): string {
    if (typeof value === 'number' && Number.isFinite(value)) {
      return String(value);
    }
    if (typeof value === 'string' && value.trim() !== '' && !Number.isNaN(Number(value))) {
      return value;
    }
    throw new ValidationError(`${fieldName} must be a decimal number`, fieldName);
  }
}

export class UUIDType extends Type<string> {
  constructor(options: Record<string, unknown> = {}) {
    super('uuid', options);
  }

  protected override normalize(value: unknown, fieldName: string): string {
    if (typeof value !== 'string' || !isUUID.anyNonNil(value)) {
      throw new ValidationError(`${fieldName} must be a valid UUID`, fieldName);
    }
    return value;
  }
}

export class EnumType<TValue extends string | number> extends Type<TValue> {
  readonly values: readonly TValue[];

  constructor(values: readonly TValue[], options: Record<string, unknown> = {}) {
    super('enum', options);
    this.values = values;
  }

  protected override normalize(value: unknown, fieldName: string): TValue {
    const match = this.values.find(candidate => candidate === value);
    if (match === undefined) {
      throw new ValidationError(`${fieldName} must be one of: ${this.values.join(', ')}`, fieldName);
    }
    return match;
  }
}

export class JsonType<TValue = unknown> extends Type<TValue> {
  constructor(options: Record<string, unknown> = {}) {
    super('json', options);
  }
}

// Factory helpers used by schema definitions.
const types = {
  string: (options?: Record<string, unknown>) => new StringType(options),
  number: (options?: Record<string, unknown>) => new NumberType(options),
  integer: (options?: Record<string, unknown>) => new NumberType(options).integer(),
  boolean: (options?: Record<string, unknown>) => new BooleanType(options),
  date: (options?: Record<string, unknown>) => new DateType('date', options),
  datetime: (options?: Record<string, unknown>) => new DateType('datetime', options),
  decimal: (options?: Record<string, unknown>) => new DecimalType(options),
  uuid: (options?: Record<string, unknown>) => new UUIDType(options),
  enum: <TValue extends string | number>(
    values: readonly TValue[],
    options?: Record<string, unknown>
  ) => new EnumType<TValue>(values, options),
  json: <TValue = unknown>(options?: Record<string, unknown>) => new JsonType<TValue>(options),
  any: (options?: Record<string, unknown>) => new Type<unknown>('any', options),
} as const;

export default types;
