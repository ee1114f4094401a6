import { pino } from "pino";
import { config } from "./config.js";

export const logger = pino({
  level: config.nodeEnv === "test" ? "silent" : config.logLevel,
  base: { service: "keyrelay" },
  redact: ["req.headers.authorization"],
});
