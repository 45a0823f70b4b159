import { loadConfig } from "@/lib/config";
import { errorMessage } from "@/lib/errors";
import { createRuntime } from "@/lib/pipeline/setup";
import { runStore } from "@/lib/runs/store";
import { createApp } from "./app";

function main(): void {
  const config = loadConfig();
  const runtime = createRuntime(config);
  const app = createApp({ ...runtime, runs: runStore });

  const server = app.listen(config.port, () => {
    console.log(`[Server] Listening on http://localhost:${config.port} (graph ${config.falkordb.graph})`);
  });

  const shutdown = () => {
    console.log("[Server] Shutting down");
    server.close();
    runtime.engine.close().catch(error => {
      console.error(`[Server] Error closing graph connection: ${errorMessage(error)}`);
    });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

try {
  main();
} catch (error) {
  console.error(`[Server] Startup failed: ${errorMessage(error)}`);
  process.exit(1);
}
