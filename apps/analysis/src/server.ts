import 'dotenv/config';
import { JsonlRawLogReader } from '@rail-trace/adapters';
import { buildApp, buildHttpServer } from './app.js';
import { loadAnalysisConfig } from './config.js';
import { TrainStatistics } from './services/aggregation/train-statistics.js';
import type { CategoryCount } from './services/aggregation/categorical-counter.js';
import { VehicleHistory } from './services/history/vehicle-history.js';
import { ReplayEngine } from './services/replay/replay-engine.js';
import { scanLog } from './services/scan/log-scanner.js';
import type { ScanReport } from './services/scan/log-scanner.js';

function formatCounts<T>(counts: CategoryCount<T>[], label: (value: T) => string): string {
  return counts.map(({ value, count }) => `${value === null ? '<none>' : label(value)}=${count}`).join(', ');
}

function logSummary(report: ScanReport, statistics: TrainStatistics): void {
  console.log(
    `[analysis] ${report.lines} lines, ${report.envelopes} envelopes, ${report.parseErrors} unparseable, ` +
      `${report.unrecognized} unrecognized`,
  );
  console.log(
    `[analysis] trains: ${report.trains} (${report.trainErrors} rejected), ` +
      `records: ${report.records} (${report.recordErrors} rejected)`,
  );
  const identity = (value: string) => value;
  console.log(`[analysis] delays: ${formatCounts(statistics.delays.entries(), identity)}`);
  console.log(`[analysis] states: ${formatCounts(statistics.states.entries(), identity)}`);
  console.log(`[analysis] ride_states: ${formatCounts(statistics.rideStates.entries(), identity)}`);
  console.log(`[analysis] original_lines: ${formatCounts(statistics.originalLines.entries(), identity)}`);
  console.log(`[analysis] lines: ${formatCounts(statistics.lines.entries(), (line) => line.name)}`);
}

async function main() {
  const config = loadAnalysisConfig();

  // A missing log is fatal: there is nothing to analyse
  const reader = await JsonlRawLogReader.open(config.rawLogPath);
  const history = new VehicleHistory();
  const statistics = new TrainStatistics();
  const report = await scanLog(reader.frames(), { history, statistics });
  logSummary(report, statistics);

  const { httpServer, wsGateway } = buildHttpServer(config.surface);
  const replay = new ReplayEngine({
    history,
    surface: wsGateway,
    tickIntervalMs: config.tickIntervalMs,
    frameBound: config.frameBound,
  });
  const app = buildApp(
    { history, statistics, report, replay, surface: config.surface },
    { corsOrigin: config.corsOrigin },
  );
  httpServer.on('request', app);

  httpServer.listen(config.port, () => {
    console.log(`[server] listening on http://0.0.0.0:${config.port}`);
  });
  replay.start();

  const shutdown = async () => {
    console.log('[server] shutting down...');
    replay.stop();
    await wsGateway.close();
    httpServer.close();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
