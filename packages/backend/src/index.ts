import "./env.js";
import { buildApp } from "./app.js";
import { config } from "./config.js";
import { client } from "./db/connection.js";
import { logger } from "./logger.js";

async function main() {
  const app = await buildApp();

  const shutdown = async (signal: string) => {
    logger.info({ signal }, "shutting down");
    await app.close();
    await client.end();
    process.exit(0);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error({ err }, "shutdown failed");
        process.exit(1);
      });
    });
  }

  await app.listen({ host: config.host, port: config.port });
  logger.info(`keyrelay running at http://${config.host}:${config.port}`);
}

main().catch((err) => {
  logger.fatal({ err }, "failed to start server");
  process.exit(1);
});
