import { lineKey } from '@rail-trace/domain';
import type { Line, Train } from '@rail-trace/domain';
import { CategoricalCounter } from './categorical-counter.js';
import type { CategoryCount } from './categorical-counter.js';

export interface TrainStatisticsSnapshot {
  readonly trains: number;
  readonly delays: CategoryCount<string>[];
  readonly states: CategoryCount<string>[];
  readonly rideStates: CategoryCount<string>[];
  readonly originalLines: CategoryCount<string>[];
  readonly lines: CategoryCount<Line>[];
}

/** Frequency counts over the optional fields of every decoded Train. */
export class TrainStatistics {
  private trainCount = 0;
  readonly delays = CategoricalCounter.ofStrings();
  readonly states = CategoricalCounter.ofStrings();
  readonly rideStates = CategoricalCounter.ofStrings();
  readonly originalLines = CategoricalCounter.ofStrings();
  readonly lines = new CategoricalCounter<Line>(lineKey);

  get trains(): number {
    return this.trainCount;
  }

  record(train: Train): void {
    this.trainCount += 1;
    this.delays.increment(train.delay);
    this.states.increment(train.state);
    this.rideStates.increment(train.rideState);
    this.originalLines.increment(train.originalLine);
    this.lines.increment(train.line);
  }

  snapshot(): TrainStatisticsSnapshot {
    return {
      trains: this.trainCount,
      delays: this.delays.entries(),
      states: this.states.entries(),
      rideStates: this.rideStates.entries(),
      originalLines: this.originalLines.entries(),
      lines: this.lines.entries(),
    };
  }
}
