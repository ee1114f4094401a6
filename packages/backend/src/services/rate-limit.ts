import { eq, and, gt, min, sql, type SQL } from "drizzle-orm";
import { config } from "../config.js";
import { db, type Executor } from "../db/connection.js";
import { messages } from "../db/schema/messages.js";
import { tooManyRequests } from "../errors.js";

export type RateTarget = { conversationId: string } | { groupId: string };

interface WindowRule {
  limit: number;
  windowMs: number;
  scope: SQL | undefined;
}

interface WindowUsage {
  count: number;
  oldest: Date | null;
}

async function usage(
  executor: Executor,
  senderUserId: string,
  rule: WindowRule,
  now: Date
): Promise<WindowUsage> {
  const since = new Date(now.getTime() - rule.windowMs);
  const [row] = await executor
    .select({
      count: sql<number>`count(*)::int`,
      oldest: min(messages.createdAt),
    })
    .from(messages)
    .where(
      and(
        eq(messages.senderUserId, senderUserId),
        gt(messages.createdAt, since),
        rule.scope
      )
    );
  return { count: row?.count ?? 0, oldest: row?.oldest ?? null };
}

/** Seconds until the oldest in-window message ages out, never less than one. */
export function retryAfterSeconds(oldest: Date | null, windowMs: number, now: Date) {
  if (!oldest) return Math.max(1, Math.ceil(windowMs / 1000));
  return Math.max(1, Math.ceil((oldest.getTime() + windowMs - now.getTime()) / 1000));
}

async function enforce(
  executor: Executor,
  senderUserId: string,
  rule: WindowRule,
  label: string,
  now: Date
) {
  if (rule.limit <= 0) return;
  const { count, oldest } = await usage(executor, senderUserId, rule, now);
  if (count < rule.limit) return;

  const windowSeconds = Math.round(rule.windowMs / 1000);
  throw tooManyRequests(
    `${label}: at most ${rule.limit} messages per ${windowSeconds}s`,
    rule.limit,
    retryAfterSeconds(oldest, rule.windowMs, now)
  );
}

/**
 * Both windows are derived from persisted messages: a global per-sender
 * window across all targets and a burst window on the target itself.
 */
export async function checkSendRate(
  senderUserId: string,
  target: RateTarget,
  executor: Executor = db,
  now: Date = new Date()
) {
  await enforce(
    executor,
    senderUserId,
    {
      limit: config.messaging.maxMessagesPerMinute,
      windowMs: 60_000,
      scope: undefined,
    },
    "Rate limit exceeded",
    now
  );

  await enforce(
    executor,
    senderUserId,
    {
      limit: config.messaging.burstMaxMessages,
      windowMs: config.messaging.burstWindowSeconds * 1000,
      scope:
        "conversationId" in target
          ? eq(messages.conversationId, target.conversationId)
          : eq(messages.groupId, target.groupId),
    },
    "Sending too fast",
    now
  );
}
