import type { VehicleHistory } from './services/history/vehicle-history.js';
import type { TrainStatistics } from './services/aggregation/train-statistics.js';
import type { ReplayEngine } from './services/replay/replay-engine.js';
import type { ScanReport } from './services/scan/log-scanner.js';

/** Everything the HTTP layer reads: the finished scan and the running replay. */
export interface AnalysisContext {
  readonly history: VehicleHistory;
  readonly statistics: TrainStatistics;
  readonly report: ScanReport;
  readonly replay: ReplayEngine;
  readonly surface: { readonly width: number; readonly height: number };
}
