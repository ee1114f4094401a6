import type { FastifyInstance } from "fastify";
import {
  uploadKeyBundleSchema,
  fetchKeyBundleQuerySchema,
  userIdParamsSchema,
  deviceIdParamsSchema,
  revokeDeviceSchema,
  claimPrekeySchema,
} from "@keyrelay/shared";
import { authMiddleware } from "../../../middleware/auth.js";
import {
  uploadKeyBundle,
  fetchKeyBundle,
  listDevices,
  revokeDevice,
  claimPrekey,
} from "../../../services/keys.js";

export async function keyRoutes(app: FastifyInstance) {
  app.addHook("preHandler", authMiddleware);

  // Upload (or replace) a device's key bundle and one-time prekeys
  app.post("/api/v1/e2ee/keys", async (request) => {
    const input = uploadKeyBundleSchema.parse(request.body);
    return uploadKeyBundle(request.user!.userId, input);
  });

  app.get("/api/v1/e2ee/keys/:userId", async (request) => {
    const { userId } = userIdParamsSchema.parse(request.params);
    const { bundleVersion } = fetchKeyBundleQuerySchema.parse(request.query);
    return fetchKeyBundle(request.user!.userId, userId, bundleVersion);
  });

  app.get("/api/v1/e2ee/devices", async (request) => {
    return listDevices(request.user!.userId);
  });

  app.post("/api/v1/e2ee/devices/:deviceId/revoke", async (request) => {
    const { deviceId } = deviceIdParamsSchema.parse(request.params);
    const { reason } = revokeDeviceSchema.parse(request.body ?? {});
    return revokeDevice(request.user!.userId, deviceId, reason);
  });

  app.post("/api/v1/e2ee/prekeys/claim", async (request) => {
    const input = claimPrekeySchema.parse(request.body);
    return claimPrekey(request.user!.userId, input);
  });
}
