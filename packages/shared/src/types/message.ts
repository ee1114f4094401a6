export interface ConversationParticipant {
  userId: string;
  deviceIds: string[];
}

export interface Conversation {
  id: string;
  createdAt: Date;
  lastMessageAt: Date | null;
  participants: ConversationParticipant[];
}

export interface ConversationSummary {
  id: string;
  peerUserId: string;
  lastMessageAt: Date | null;
  unreadCount: number;
}

export interface MessageEnvelope {
  id: string;
  conversationId: string | null;
  groupId: string | null;
  senderUserId: string;
  senderDeviceId: string;
  ciphertext: string;
  proto: number;
  groupEpoch: number | null;
  replyToMessageId: string | null;
  clientMessageId: string | null;
  createdAt: Date;
}

export interface SendMessageResult extends MessageEnvelope {
  duplicate: boolean;
}

export interface MessagePage {
  items: MessageEnvelope[];
  cursor: string | null;
}
