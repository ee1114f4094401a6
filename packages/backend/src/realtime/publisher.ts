import type { RealtimeEvent } from "@keyrelay/shared";
import { logger } from "../logger.js";
import { sendEvent } from "./sse.js";

export type Publisher = (
  topic: string,
  event: RealtimeEvent
) => void | Promise<void>;

const log = logger.child({ module: "realtime" });

const USER_TOPIC_PREFIX = "user:";

function userTopic(userId: string): string {
  return `${USER_TOPIC_PREFIX}${userId}`;
}

const ssePublisher: Publisher = (topic, event) => {
  if (!topic.startsWith(USER_TOPIC_PREFIX)) return;
  sendEvent(topic.slice(USER_TOPIC_PREFIX.length), event.type, event);
};

let publisher: Publisher = ssePublisher;

/** Swap the transport. Passing null restores the SSE registry. */
export function setPublisher(next: Publisher | null) {
  publisher = next ?? ssePublisher;
}

export async function publish(topic: string, event: RealtimeEvent) {
  await publisher(topic, event);
}

/**
 * Fan an event out to each user's topic after the write has committed.
 * Delivery is best effort: clients recover through message history and the
 * stored epoch.
 */
export async function publishToUsers(
  userIds: Iterable<string>,
  event: RealtimeEvent
) {
  for (const userId of new Set(userIds)) {
    const topic = userTopic(userId);
    try {
      await publish(topic, event);
    } catch (err) {
      log.warn({ err, topic, event: event.type }, "realtime publish failed");
    }
  }
}
