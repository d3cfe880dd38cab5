import type { DrawSurfacePort, RgbaColor } from '@rail-trace/domain';

export type DrawCommand =
  | { readonly op: 'clear'; readonly color: RgbaColor }
  | { readonly op: 'circle'; readonly x: number; readonly y: number; readonly radius: number; readonly color: RgbaColor };

/** In-memory surface that keeps the draw calls of the current frame. */
export class RecordingSurface implements DrawSurfacePort {
  private commands: DrawCommand[] = [];
  private presented = 0;

  constructor(
    readonly width: number,
    readonly height: number,
  ) {}

  get frame(): readonly DrawCommand[] {
    return this.commands;
  }

  get framesPresented(): number {
    return this.presented;
  }

  clearBackground(color: RgbaColor): void {
    this.commands = [{ op: 'clear', color }];
  }

  drawCircle(x: number, y: number, radius: number, color: RgbaColor): void {
    this.commands.push({ op: 'circle', x, y, radius, color });
  }

  async nextFrame(): Promise<void> {
    this.presented += 1;
  }
}
