export interface ReplayStatus {
  readonly running: boolean;
  readonly paused: boolean;
  readonly frameIndex: number;
  readonly frameBound: number;
  readonly vehicles: number;
}

export interface ReplayControlPort {
  start(): void;
  pause(): void;
  resume(): void;
  stop(): void;
  status(): ReplayStatus;
}
