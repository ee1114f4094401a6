import { eq, and, gte, lt, isNull, isNotNull, sql } from "drizzle-orm";
import { config } from "../config.js";
import { db } from "../db/connection.js";
import { users } from "../db/schema/users.js";
import {
  devices,
  keyBundles,
  oneTimePrekeys,
  identityChangeEvents,
} from "../db/schema/devices.js";
import { groups } from "../db/schema/groups.js";
import { messages, deliveryReceipts } from "../db/schema/messages.js";
import { forbidden, serviceUnavailable } from "../errors.js";
import { logger } from "../logger.js";
import { getConnectionStats } from "../realtime/sse.js";

const log = logger.child({ module: "metrics" });

const WATERMARK_SAMPLE_SIZE = 10;
const HOUR_MS = 3_600_000;

interface WatermarkBucket {
  threshold: number;
  count: number;
  deviceIds: string[];
}

export interface MetricsPayload {
  generatedAt: string;
  connections: ReturnType<typeof getConnectionStats>;
  prekeys: {
    available: number;
    claimed: number;
    low: WatermarkBucket;
    critical: WatermarkBucket;
    staleSignedPrekeys: number;
  };
  messages: { today: number; lastHour: number };
  delivery: {
    undelivered: number;
    deliveredUnread: number;
    avgLatencyMs: number | null;
  };
  devices: { active: number; revoked: number };
  groups: { total: number; active: number; closed: number; averageSize: number };
  rekeys: { last24h: number };
  identityChanges: { last24h: number; blocked24h: number };
}

let cache: { payload: MetricsPayload; expiresAt: number } | null = null;

export function resetMetricsCache() {
  cache = null;
}

function bucket(
  counts: { deviceId: string; unclaimed: number }[],
  threshold: number
): WatermarkBucket {
  const under = counts.filter((c) => c.unclaimed <= threshold);
  return {
    threshold,
    count: under.length,
    deviceIds: under.slice(0, WATERMARK_SAMPLE_SIZE).map((c) => c.deviceId),
  };
}

export async function collectMetrics(now = new Date()): Promise<MetricsPayload> {
  const hourAgo = new Date(now.getTime() - HOUR_MS);
  const dayAgo = new Date(now.getTime() - 24 * HOUR_MS);
  const startOfDay = new Date(now);
  startOfDay.setUTCHours(0, 0, 0, 0);
  const staleBefore = new Date(
    now.getTime() - config.e2ee.signedPrekeyMaxAgeDays * 24 * HOUR_MS
  );

  const [pool] = await db
    .select({
      available: sql<number>`(count(*) filter (where ${oneTimePrekeys.claimed} = false))::int`,
      claimed: sql<number>`(count(*) filter (where ${oneTimePrekeys.claimed} = true))::int`,
    })
    .from(oneTimePrekeys)
    .innerJoin(devices, eq(devices.id, oneTimePrekeys.deviceId))
    .where(eq(devices.status, "active"));

  const perDevice = await db
    .select({
      deviceId: devices.id,
      unclaimed: sql<number>`count(${oneTimePrekeys.id})::int`,
    })
    .from(devices)
    .innerJoin(keyBundles, eq(keyBundles.deviceId, devices.id))
    .leftJoin(
      oneTimePrekeys,
      and(eq(oneTimePrekeys.deviceId, devices.id), eq(oneTimePrekeys.claimed, false))
    )
    .where(eq(devices.status, "active"))
    .groupBy(devices.id)
    .orderBy(sql`count(${oneTimePrekeys.id})`, devices.id);

  const [stale] = await db
    .select({ count: sql<number>`count(*)::int` })
    .from(keyBundles)
    .innerJoin(devices, eq(devices.id, keyBundles.deviceId))
    .where(and(eq(devices.status, "active"), lt(keyBundles.updatedAt, staleBefore)));

  const [volume] = await db
    .select({
      today: sql<number>`(count(*) filter (where ${messages.createdAt} >= ${startOfDay.toISOString()}))::int`,
      lastHour: sql<number>`(count(*) filter (where ${messages.createdAt} >= ${hourAgo.toISOString()}))::int`,
    })
    .from(messages)
    .where(gte(messages.createdAt, startOfDay < hourAgo ? startOfDay : hourAgo));

  const [undelivered] = await db
    .select({ count: sql<number>`count(*)::int` })
    .from(deliveryReceipts)
    .where(and(isNull(deliveryReceipts.deliveredAt), isNull(deliveryReceipts.readAt)));

  const [unread] = await db
    .select({ count: sql<number>`count(*)::int` })
    .from(deliveryReceipts)
    .where(and(isNotNull(deliveryReceipts.deliveredAt), isNull(deliveryReceipts.readAt)));

  const [latency] = await db
    .select({
      avgMs: sql<number | null>`avg(extract(epoch from (${deliveryReceipts.deliveredAt} - ${messages.createdAt})) * 1000)::float8`,
    })
    .from(deliveryReceipts)
    .innerJoin(messages, eq(messages.id, deliveryReceipts.messageId))
    .where(gte(deliveryReceipts.deliveredAt, hourAgo));

  const [deviceCounts] = await db
    .select({
      active: sql<number>`(count(*) filter (where ${devices.status} = 'active'))::int`,
      revoked: sql<number>`(count(*) filter (where ${devices.status} = 'revoked'))::int`,
    })
    .from(devices);

  const [groupStats] = await db
    .select({
      total: sql<number>`count(*)::int`,
      closed: sql<number>`(count(*) filter (where ${groups.isClosed}))::int`,
      averageSize: sql<number | null>`(avg(${groups.memberCount}) filter (where not ${groups.isClosed}))::float8`,
      rekeys: sql<number>`(count(*) filter (where ${groups.epochChangedAt} >= ${dayAgo.toISOString()}))::int`,
    })
    .from(groups);

  const [identity] = await db
    .select({
      changes: sql<number>`(count(*) filter (where ${identityChangeEvents.reason} = 'identity_change'))::int`,
      blocks: sql<number>`(count(*) filter (where ${identityChangeEvents.reason} = 'identity_change_block'))::int`,
    })
    .from(identityChangeEvents)
    .where(gte(identityChangeEvents.createdAt, dayAgo));

  const totalGroups = groupStats?.total ?? 0;
  const closedGroups = groupStats?.closed ?? 0;
  const avgLatency = latency?.avgMs ?? null;

  return {
    generatedAt: now.toISOString(),
    connections: getConnectionStats(),
    prekeys: {
      available: pool?.available ?? 0,
      claimed: pool?.claimed ?? 0,
      low: bucket(perDevice, config.e2ee.otpkLowWatermark),
      critical: bucket(perDevice, config.e2ee.otpkCriticalWatermark),
      staleSignedPrekeys: stale?.count ?? 0,
    },
    messages: {
      today: volume?.today ?? 0,
      lastHour: volume?.lastHour ?? 0,
    },
    delivery: {
      undelivered: undelivered?.count ?? 0,
      deliveredUnread: unread?.count ?? 0,
      avgLatencyMs: avgLatency === null ? null : Math.round(avgLatency),
    },
    devices: {
      active: deviceCounts?.active ?? 0,
      revoked: deviceCounts?.revoked ?? 0,
    },
    groups: {
      total: totalGroups,
      active: totalGroups - closedGroups,
      closed: closedGroups,
      averageSize: Math.round((groupStats?.averageSize ?? 0) * 100) / 100,
    },
    rekeys: { last24h: groupStats?.rekeys ?? 0 },
    identityChanges: {
      last24h: identity?.changes ?? 0,
      blocked24h: identity?.blocks ?? 0,
    },
  };
}

export async function getMetrics(
  callerId: string
): Promise<MetricsPayload & { stale: boolean }> {
  const caller = await db.query.users.findFirst({
    where: eq(users.id, callerId),
    columns: { isOperator: true },
  });
  if (!caller?.isOperator) {
    throw forbidden("FORBIDDEN", "Operator access required");
  }

  if (cache && cache.expiresAt > Date.now()) {
    return { ...cache.payload, stale: false };
  }

  try {
    const payload = await collectMetrics();
    cache = { payload, expiresAt: Date.now() + config.metrics.cacheSeconds * 1000 };
    return { ...payload, stale: false };
  } catch (err) {
    if (cache) {
      log.warn({ err }, "metrics store unavailable; serving cached payload");
      return { ...cache.payload, stale: true };
    }
    log.error({ err }, "metrics store unavailable");
    throw serviceUnavailable("METRICS_UNAVAILABLE", "Metrics are temporarily unavailable");
  }
}
