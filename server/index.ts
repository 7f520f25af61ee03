import http from "node:http";
import logger from "./logger";
import { env } from "./config/env";
import { createApp } from "./app";
import { closeDatabase } from "./db";

const app = createApp();
const server = http.createServer(app);
const port = Number.parseInt(env.PORT, 10);

server.listen(port, () => {
  logger.info("Inquiry service listening", { port, env: env.NODE_ENV });
});

let shuttingDown = false;

async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info("Shutting down", { signal });

  try {
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    await closeDatabase();
    process.exit(0);
  } catch (error) {
    logger.fatal("Shutdown failed", { error });
    process.exit(1);
  }
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));
