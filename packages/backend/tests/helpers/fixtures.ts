import { sql } from "drizzle-orm";
import { db } from "../../src/db/connection.js";
import { users } from "../../src/db/schema/users.js";
import { resetMetricsCache } from "../../src/services/metrics.js";
import { uploadKeyBundle } from "../../src/services/keys.js";
import { config } from "../../src/config.js";

const defaults = structuredClone({
  e2ee: config.e2ee,
  messaging: config.messaging,
  groups: config.groups,
  metrics: config.metrics,
});

export async function resetDb() {
  await db.execute(sql`TRUNCATE users, conversations RESTART IDENTITY CASCADE`);
  resetMetricsCache();
  Object.assign(config.e2ee, defaults.e2ee);
  Object.assign(config.messaging, defaults.messaging);
  Object.assign(config.groups, defaults.groups);
  Object.assign(config.metrics, defaults.metrics);
}

export async function createUser(username: string, isOperator = false) {
  const [user] = await db
    .insert(users)
    .values({ username, isOperator })
    .returning();
  if (!user) throw new Error("user insert returned no row");
  return user;
}

export const b64 = (text: string) => Buffer.from(text).toString("base64");

export async function uploadBundle(
  userId: string,
  options: { deviceId?: string; identityKey?: string; prekeys?: number } = {}
) {
  const count = options.prekeys ?? 3;
  return uploadKeyBundle(userId, {
    deviceId: options.deviceId,
    deviceName: "laptop",
    identityKey: options.identityKey ?? b64(`identity-${userId}`),
    signedPrekey: b64("signed-prekey"),
    signedPrekeySig: b64("signature"),
    oneTimePrekeys: Array.from({ length: count }, (_, i) => b64(`otpk-${i}`)),
  });
}
