import { createCalendarRuntime } from "@daybook/core";
import { createServer } from "./server.js";

async function main() {
  const runtime = createCalendarRuntime();
  console.log(
    `Data directory: ${runtime.dataDir} (timezone ${runtime.config.timezone})`,
  );

  // Create and start server
  const port = parseInt(process.env.DAYBOOK_PORT ?? "4321", 10);
  const server = await createServer({ coordinator: runtime.coordinator });

  try {
    await server.listen({ port, host: "0.0.0.0" });
    console.log(`\nDaybook API running at http://localhost:${port}`);
    console.log("Press Ctrl+C to stop\n");
  } catch (err) {
    console.error("Failed to start server:", err);
    process.exit(1);
  }

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`\n${signal} received, shutting down gracefully...`);
    try {
      await server.close();
      console.log("Shutdown complete");
      process.exit(0);
    } catch (err) {
      console.error("Error during shutdown:", err);
      process.exit(1);
    }
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
