export type ColorConversionErrorKind = 'wrong-prefix' | 'parse';

export class ColorConversionError extends Error {
  constructor(
    readonly kind: ColorConversionErrorKind,
    readonly input: string,
  ) {
    super(
      kind === 'wrong-prefix'
        ? `color '${input}' does not start with '#'`
        : `color '${input}' is not a #RRGGBB hex value`,
    );
    this.name = 'ColorConversionError';
  }
}
