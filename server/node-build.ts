import { createServer, scheduleIssuanceRetries } from "./index";
import { closeDatabase } from "./lib/database";
import { getEnv } from "./lib/env";
import { seedServiceTypes } from "./store/service-orders";

const app = createServer();
const port = getEnv().PORT;

const server = app.listen(port, () => {
  // eslint-disable-next-line no-console
  console.log(`[server] listening on http://localhost:${port}`);
});

seedServiceTypes().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("[services] failed to seed service types", err);
});

let stopScheduler: () => void = () => undefined;
try {
  stopScheduler = scheduleIssuanceRetries();
} catch (err) {
  // eslint-disable-next-line no-console
  console.error("[issuance] failed to start retry scheduler", err);
}

function shutdown(signal: string) {
  // eslint-disable-next-line no-console
  console.log(`[server] ${signal} received, shutting down`);
  stopScheduler();
  server.close(() => {
    closeDatabase()
      .catch((err: unknown) => {
        // eslint-disable-next-line no-console
        console.error("[database] close failed", err);
      })
      .finally(() => process.exit(0));
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
