export type DecodeErrorDetail =
  | { readonly kind: 'parse'; readonly reason: string }
  | { readonly kind: 'missing-property'; readonly property: string }
  | { readonly kind: 'incorrect-type'; readonly expected: string; readonly actual: string }
  | {
      readonly kind: 'incorrect-value-type';
      readonly expected: string;
      readonly value: string;
      readonly actual: string;
    }
  | { readonly kind: 'missing-items'; readonly expected: number; readonly actual: number };

export type DecodeErrorKind = DecodeErrorDetail['kind'];

function describe(detail: DecodeErrorDetail): string {
  switch (detail.kind) {
    case 'parse':
      return `unable to parse frame: ${detail.reason}`;
    case 'missing-property':
      return `missing property: '${detail.property}'`;
    case 'incorrect-type':
      return `expected value to be of type '${detail.expected}', but found '${detail.actual}'`;
    case 'incorrect-value-type':
      return `expected ${detail.value} to be of type '${detail.expected}', but found '${detail.actual}'`;
    case 'missing-items':
      return `expected ${detail.expected} items, but found ${detail.actual}`;
  }
}

/** Failure to turn a raw frame, or part of one, into a domain value. */
export class DecodeError extends Error {
  readonly detail: DecodeErrorDetail;

  constructor(detail: DecodeErrorDetail) {
    super(describe(detail));
    this.name = 'DecodeError';
    this.detail = detail;
  }

  get kind(): DecodeErrorKind {
    return this.detail.kind;
  }

  static parse(reason: string): DecodeError {
    return new DecodeError({ kind: 'parse', reason });
  }

  static missingProperty(property: string): DecodeError {
    return new DecodeError({ kind: 'missing-property', property });
  }

  static incorrectType(expected: string, actual: string): DecodeError {
    return new DecodeError({ kind: 'incorrect-type', expected, actual });
  }

  static incorrectValueType(expected: string, value: string, actual: string): DecodeError {
    return new DecodeError({ kind: 'incorrect-value-type', expected, value, actual });
  }

  static missingItems(expected: number, actual: number): DecodeError {
    return new DecodeError({ kind: 'missing-items', expected, actual });
  }
}
