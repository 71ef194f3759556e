import { createServer } from "./server.js";
import { loadEnv } from "./env.js";
import { createLogger } from "./logger.js";

const env = loadEnv();
const logger = createLogger(env.logLevel);

async function start(): Promise<void> {
  const app = await createServer({ env, logger });

  await app.listen({ host: env.host, port: env.port });
  app.log.info({ port: env.port }, "agent-server started");

  const shutdown = async () => {
    await app.close();
    process.exit(0);
  };

  process.on("SIGINT", () => {
    void shutdown();
  });
  process.on("SIGTERM", () => {
    void shutdown();
  });
}

start().catch((error: unknown) => {
  logger.fatal({ err: error }, "agent-server failed to start");
  process.exit(1);
});
