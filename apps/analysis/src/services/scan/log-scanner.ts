import type { DecodeError } from '@rail-trace/domain';
import { decodeEnvelope } from '../decoder/envelope-decoder.js';
import { decodePositionRecord, decodeTrain } from '../decoder/trajectory-decoder.js';
import type { TrainStatistics } from '../aggregation/train-statistics.js';
import type { VehicleHistory } from '../history/vehicle-history.js';

export type ScanStage = 'envelope' | 'train' | 'record';

export interface ScanIssue {
  readonly stage: ScanStage;
  /** 1-based line number in the log */
  readonly lineNumber: number;
  readonly error: DecodeError;
}

export interface ScanReport {
  lines: number;
  blankLines: number;
  envelopes: number;
  parseErrors: number;
  unrecognized: number;
  trajectories: number;
  trains: number;
  trainErrors: number;
  records: number;
  recordErrors: number;
}

export interface ScanOptions {
  history: VehicleHistory;
  statistics: TrainStatistics;
  onIssue?: (issue: ScanIssue) => void;
}

export function emptyScanReport(): ScanReport {
  return {
    lines: 0,
    blankLines: 0,
    envelopes: 0,
    parseErrors: 0,
    unrecognized: 0,
    trajectories: 0,
    trains: 0,
    trainErrors: 0,
    records: 0,
    recordErrors: 0,
  };
}

function logIssue(issue: ScanIssue): void {
  console.warn(`[log-scanner] line ${issue.lineNumber} (${issue.stage}): ${issue.error.message}`);
}

function assertNever(value: never): never {
  throw new Error(`unhandled content: ${JSON.stringify(value)}`);
}

/**
 * Offline pass over a raw log. Bad lines and records are reported and
 * skipped; the scan itself never stops early. The Train and PositionRecord
 * projections are decoded independently from the same envelope.
 */
export async function scanLog(
  frames: AsyncIterable<string> | Iterable<string>,
  options: ScanOptions,
): Promise<ScanReport> {
  const { history, statistics } = options;
  const onIssue = options.onIssue ?? logIssue;
  const report = emptyScanReport();

  for await (const line of frames) {
    report.lines += 1;
    const lineNumber = report.lines;
    if (line.trim().length === 0) {
      report.blankLines += 1;
      continue;
    }

    const envelope = decodeEnvelope(line);
    if (!envelope.ok) {
      report.parseErrors += 1;
      onIssue({ stage: 'envelope', lineNumber, error: envelope.error });
      continue;
    }
    report.envelopes += 1;

    const { payload } = envelope.value;
    switch (payload.source) {
      case 'trajectory_schematic': {
        report.trajectories += 1;

        const train = decodeTrain(envelope.value);
        if (train.ok) {
          report.trains += 1;
          statistics.record(train.value);
        } else {
          report.trainErrors += 1;
          onIssue({ stage: 'train', lineNumber, error: train.error });
        }

        const record = decodePositionRecord(envelope.value);
        if (record.ok) {
          report.records += 1;
          history.insert(record.value);
        } else {
          report.recordErrors += 1;
          onIssue({ stage: 'record', lineNumber, error: record.error });
        }
        break;
      }
      case 'trajectory':
      case 'station_schematic':
      case 'station':
      case 'deleted_vehicles_schematic':
      case 'deleted_vehicles':
      case 'websocket':
      case 'extra_geoms':
      case 'healthcheck':
      case 'sbm_newsticker':
        break;
      case 'unrecognized':
        report.unrecognized += 1;
        break;
      default:
        assertNever(payload);
    }
  }

  return report;
}
