import config from "./config.js";
import { openDatabase } from "./db/database.js";
import { createContext } from "./context.js";
import { buildServer } from "./server.js";

async function main() {
  const db = openDatabase(config.dataDir);
  const ctx = createContext(config, db);

  console.log(`[server] Instance ${config.instanceId}`);
  console.log(`[server] Ephemeral store: ${config.redisUrl ? "redis" : "in-process"}`);

  // Relay notifications produced by other processes to local inbox sockets
  const subscribed = await ctx.subscriber.start();
  if (!subscribed) {
    console.warn("[bridge] Inbox push disabled; clients will see new items on their next fetch");
  }

  ctx.heartbeat.start();

  const app = await buildServer(ctx);
  await app.listen({ port: config.port, host: config.host });
  console.log(`[server] Listening on ${config.host}:${config.port}`);

  // Graceful shutdown
  const shutdown = async () => {
    console.log("\n[server] Shutting down...");
    try {
      await ctx.close();
      await app.close();
      db.close();
    } catch (err) {
      console.error("[server] Shutdown failed:", err);
      process.exit(1);
    }
    process.exit(0);
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err) => {
  console.error("[server] Fatal error:", err);
  process.exit(1);
});
