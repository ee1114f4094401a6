import type { FastifyReply } from "fastify";

type StreamClient = {
  userId: string;
  reply: FastifyReply;
};

const clients = new Map<string, Set<StreamClient>>();

export function addClient(userId: string, reply: FastifyReply) {
  let userClients = clients.get(userId);
  if (!userClients) {
    userClients = new Set();
    clients.set(userId, userClients);
  }

  const client: StreamClient = { userId, reply };
  userClients.add(client);

  reply.raw.write(`event: connected\ndata: ${JSON.stringify({ ok: true })}\n\n`);

  reply.raw.on("close", () => {
    const current = clients.get(userId);
    current?.delete(client);
    if (current?.size === 0) {
      clients.delete(userId);
    }
  });
}

export function sendEvent(userId: string, event: string, data: unknown) {
  const userClients = clients.get(userId);
  if (!userClients) return;

  const payload = `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
  for (const client of userClients) {
    try {
      client.reply.raw.write(payload);
    } catch {
      // Socket already gone; the close handler may not have fired yet.
      userClients.delete(client);
    }
  }
}

export function getConnectionStats() {
  const perUser: Record<string, number> = {};
  let total = 0;
  for (const [userId, userClients] of clients) {
    perUser[userId] = userClients.size;
    total += userClients.size;
  }
  return { total, users: clients.size, perUser };
}
