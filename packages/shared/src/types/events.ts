import type { EpochChangeReason } from "./group.js";
import type { MessageEnvelope } from "./message.js";

// Payloads published on `user:<id>` topics.

export interface EpochChangedEvent {
  type: "epoch_changed";
  groupId: string;
  epoch: number;
  reason: EpochChangeReason;
}

export interface MessageEvent {
  type: "message";
  message: MessageEnvelope;
}

export type RealtimeEvent = EpochChangedEvent | MessageEvent;
