import { createApp } from "./app.js";
import { config } from "./config.js";
import { openServices } from "./container.js";
import { startScheduler } from "./scheduler.js";

const { services, close } = await openServices();
const app = createApp(services);

const server = app.listen(config.port, () => {
  console.log(`API running at http://localhost:${config.port}`);
});
const stopScheduler = startScheduler(services);

function shutdown(signal: string): void {
  console.log(`${signal} received, shutting down.`);
  stopScheduler();
  server.close(() => {
    close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error("Closing the database pool failed:", (err as Error).message);
        process.exit(1);
      },
    );
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
