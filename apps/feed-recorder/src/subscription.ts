import { FEED_TOPICS } from '@rail-trace/domain';
import type { FeedTopic } from '@rail-trace/domain';

export interface BoundingBox {
  readonly minX: number;
  readonly minY: number;
  readonly maxX: number;
  readonly maxY: number;
}

export interface Subscription {
  /** Web-mercator bounding box the server filters vehicles by. */
  readonly bbox: BoundingBox;
  readonly zoom: number;
  readonly tenant: string;
  readonly buffer: readonly [number, number];
  readonly topics: readonly FeedTopic[];
}

// Greater Munich, S-Bahn tenant
export const DEFAULT_SUBSCRIPTION: Subscription = {
  bbox: { minX: 1_152_072, minY: 6_048_052, maxX: 1_433_666, maxY: 6_205_578 },
  zoom: 5,
  tenant: 'sbm',
  buffer: [100, 100],
  topics: FEED_TOPICS,
};

export const PING_COMMAND = 'PING';

/** Commands sent right after connecting, in order. */
export function buildSubscriptionCommands(subscription: Subscription): string[] {
  const { bbox, zoom, tenant, buffer } = subscription;
  const commands = [
    `BBOX ${bbox.minX} ${bbox.minY} ${bbox.maxX} ${bbox.maxY} ${zoom} tenant=${tenant}`,
    `BUFFER ${buffer[0]} ${buffer[1]}`,
  ];
  for (const topic of subscription.topics) {
    commands.push(`GET ${topic}`, `SUB ${topic}`);
  }
  return commands;
}
