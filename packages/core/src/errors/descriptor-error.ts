/**
 * Error types for descriptor loading and connector activation
 *
 * Load-time errors reject a descriptor revision outright. Activation-time
 * errors are recoverable: the operator fixes the input and retries.
 */

export type DescriptorErrorCode =
  | 'SCHEMA_ERROR'
  | 'DUPLICATE_KEY'
  | 'UNKNOWN_TYPE'
  | 'MISSING_MANDATORY_VALUE'
  | 'INVALID_VALUE'
  | 'DESCRIPTOR_CONFLICT'
  | 'NOT_FOUND'
  | 'ALREADY_ACTIVE'
  | 'STORE_ERROR'
  | 'AUDIT_LOG_ERROR'
  | 'UNKNOWN';

export type ErrorPath = ReadonlyArray<string | number>;

export interface DescriptorErrorDetails {
  /** Error code for programmatic handling */
  code: DescriptorErrorCode;
  /** Human-readable message */
  message: string;
  /** Descriptor the error concerns, when known */
  descriptorId?: string;
  /** Location of the offending attribute, e.g. ['configuration', 1, 'key'] */
  path?: ErrorPath;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

const RECOVERABLE_CODES: ReadonlySet<DescriptorErrorCode> = new Set([
  'MISSING_MANDATORY_VALUE',
  'INVALID_VALUE',
  'ALREADY_ACTIVE',
]);

export class DescriptorError extends Error {
  readonly code: DescriptorErrorCode;
  readonly descriptorId?: string;
  readonly path?: ErrorPath;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: DescriptorErrorDetails) {
    super(details.message);
    this.name = 'DescriptorError';
    this.code = details.code;
    this.descriptorId = details.descriptorId;
    this.path = details.path;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }
  }

  /** Whether the operator can retry after correcting input */
  get recoverable(): boolean {
    return RECOVERABLE_CODES.has(this.code);
  }

  /**
   * Format error for operator tooling
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];

    if (this.descriptorId) {
      parts.push(`Descriptor: ${this.descriptorId}`);
    }

    if (this.path && this.path.length > 0) {
      parts.push(`At: ${formatPath(this.path)}`);
    }

    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }

    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      descriptorId: this.descriptorId,
      path: this.path,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

type SubclassDetails = Omit<DescriptorErrorDetails, 'code'>;

/** A required attribute is missing or has the wrong kind */
export class SchemaError extends DescriptorError {
  constructor(details: SubclassDetails) {
    super({ ...details, code: 'SCHEMA_ERROR' });
    this.name = 'SchemaError';
  }
}

/** Two configuration fields share a key */
export class DuplicateKeyError extends DescriptorError {
  readonly key: string;
  /** Positions of every field using the key */
  readonly indices: readonly number[];

  constructor(key: string, indices: readonly number[], descriptorId?: string) {
    super({
      code: 'DUPLICATE_KEY',
      message: `Duplicate configuration key '${key}' (fields ${indices.join(', ')})`,
      descriptorId,
      path: ['configuration', indices[indices.length - 1] ?? 0, 'key'],
      suggestion: 'Give every configuration field a unique key.',
      context: { key, indices },
    });
    this.name = 'DuplicateKeyError';
    this.key = key;
    this.indices = indices;
  }
}

/** A field's type is outside the known enumeration */
export class UnknownTypeError extends DescriptorError {
  readonly fieldType: string;

  constructor(fieldType: string, index: number, knownTypes: readonly string[], descriptorId?: string) {
    super({
      code: 'UNKNOWN_TYPE',
      message: `Unknown field type '${fieldType}'`,
      descriptorId,
      path: ['configuration', index, 'type'],
      suggestion: `Use one of: ${knownTypes.join(', ')}.`,
      context: { fieldType },
    });
    this.name = 'UnknownTypeError';
    this.fieldType = fieldType;
  }
}

/** Activation attempted without values for mandatory fields lacking a default */
export class MissingMandatoryValueError extends DescriptorError {
  readonly missingKeys: readonly string[];

  constructor(missingKeys: readonly string[], descriptorId?: string) {
    super({
      code: 'MISSING_MANDATORY_VALUE',
      message: `Missing value for mandatory field(s): ${missingKeys.join(', ')}`,
      descriptorId,
      suggestion: 'Supply a non-empty value for each listed field and retry activation.',
      context: { missingKeys },
    });
    this.name = 'MissingMandatoryValueError';
    this.missingKeys = missingKeys;
  }
}

/** A supplied value does not fit its field */
export class InvalidValueError extends DescriptorError {
  readonly key: string;

  constructor(key: string, reason: string, descriptorId?: string) {
    super({
      code: 'INVALID_VALUE',
      message: `Invalid value for '${key}': ${reason}`,
      descriptorId,
      path: [key],
      context: { key },
    });
    this.name = 'InvalidValueError';
    this.key = key;
  }
}

export function formatPath(path: ErrorPath): string {
  return path.length > 0 ? path.join('.') : '(root)';
}

/**
 * Helper to wrap unknown errors as DescriptorError
 */
export function wrapError(
  error: unknown,
  descriptorId?: string,
  defaultCode: DescriptorErrorCode = 'UNKNOWN'
): DescriptorError {
  if (error instanceof DescriptorError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new DescriptorError({
    code: defaultCode,
    message,
    descriptorId,
    cause,
  });
}
