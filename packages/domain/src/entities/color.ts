/** Color with channels as fractions in [0, 1]. */
export interface RgbaColor {
  readonly r: number;
  readonly g: number;
  readonly b: number;
  readonly a: number;
}

/** Builds an opaque color from a packed 0xRRGGBB integer. */
export function colorFromHex(hex: number): RgbaColor {
  return {
    r: ((hex >> 16) & 0xff) / 255,
    g: ((hex >> 8) & 0xff) / 255,
    b: (hex & 0xff) / 255,
    a: 1,
  };
}
