import type { FastifyRequest, FastifyReply } from "fastify";
import jwt from "jsonwebtoken";
import type { StringValue } from "ms";
import { z } from "zod";
import { config } from "../config.js";

const authPayloadSchema = z.object({
  userId: z.string().uuid(),
  username: z.string().min(1),
});

export type AuthPayload = z.infer<typeof authPayloadSchema>;

declare module "fastify" {
  interface FastifyRequest {
    user?: AuthPayload;
  }
}

export async function authMiddleware(
  request: FastifyRequest,
  reply: FastifyReply
) {
  const authHeader = request.headers.authorization;
  if (!authHeader?.startsWith("Bearer ")) {
    return reply
      .status(401)
      .send({ error: "Missing or invalid token", code: "UNAUTHORIZED" });
  }

  const token = authHeader.slice(7);
  try {
    const decoded = jwt.verify(token, config.jwt.secret);
    request.user = authPayloadSchema.parse(decoded);
  } catch {
    return reply
      .status(401)
      .send({ error: "Invalid or expired token", code: "UNAUTHORIZED" });
  }
}

/** A bare number is seconds; anything else goes to `ms` ("15m", "2 days"). */
export function tokenLifetime(expiry: string = config.jwt.expiry): number | StringValue {
  return /^\d+$/.test(expiry) ? parseInt(expiry, 10) : (expiry as StringValue);
}

export function generateToken(payload: AuthPayload): string {
  return jwt.sign(payload, config.jwt.secret, {
    expiresIn: tokenLifetime(),
  });
}
