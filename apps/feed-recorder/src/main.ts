import 'dotenv/config';
import { JsonlRawLogWriter, WsFeedConnector, systemClock } from '@rail-trace/adapters';
import { loadRecorderConfig } from './config.js';
import { FeedSession } from './feed-session.js';

async function main() {
  const config = loadRecorderConfig();
  const log = await JsonlRawLogWriter.open(config.rawLogPath);
  console.log(`[recorder] appending frames to ${config.rawLogPath}`);

  const session = new FeedSession({
    url: config.feedUrl,
    connector: new WsFeedConnector(),
    log,
    clock: systemClock,
    heartbeatIntervalMs: config.heartbeatIntervalMs,
    reconnectDelayMs: config.reconnectDelayMs,
  });

  const shutdown = async () => {
    console.log('[recorder] shutting down...');
    session.stop();
    await log.close();
    console.log(`[recorder] logged ${session.stats.framesLogged} frames in ${session.stats.sessions} sessions`);
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());

  await session.run();
}

main().catch((err) => {
  console.error('[recorder] fatal error', err);
  process.exit(1);
});
