/** Metadata is missing required structure or has an unsupported shape. */
export class SchemaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SchemaError';
  }
}

export type DecodeErrorKind = 'InvalidStride' | 'Truncated' | 'InvalidArgument';

/** A bin stream could not be decoded against its schema. */
export class DecodeError extends Error {
  constructor(
    public readonly kind: DecodeErrorKind,
    message: string,
  ) {
    super(message);
    this.name = 'DecodeError';
  }
}
