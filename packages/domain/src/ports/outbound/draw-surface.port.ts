import type { RgbaColor } from '../../entities/color.js';

export interface DrawSurfacePort {
  readonly width: number;
  readonly height: number;
  clearBackground(color: RgbaColor): void;
  drawCircle(x: number, y: number, radius: number, color: RgbaColor): void;
  /** Resolves once the current frame has been presented. */
  nextFrame(): Promise<void>;
}
