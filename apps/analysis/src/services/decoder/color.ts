import { ColorConversionError, fail, ok } from '@rail-trace/domain';
import type { Result, RgbaColor } from '@rail-trace/domain';

const HEX_COLOR = /^#[0-9a-fA-F]{6}$/;

/** Parses `#RRGGBB` into an opaque color with channels as `byte / 255`. */
export function parseHexColor(text: string): Result<RgbaColor, ColorConversionError> {
  if (!text.startsWith('#')) return fail(new ColorConversionError('wrong-prefix', text));
  if (!HEX_COLOR.test(text)) return fail(new ColorConversionError('parse', text));

  const channel = (offset: number) => parseInt(text.slice(offset, offset + 2), 16) / 255;
  return ok({ r: channel(1), g: channel(3), b: channel(5), a: 1 });
}
