import { defaultConfigManager } from "./config/configManager.js";
import { createEngineRuntime } from "./runtime/botRuntime.js";
import { createApp } from "./server.js";

async function main() {
  const config = await defaultConfigManager.load();
  const runtime = await createEngineRuntime(config);
  console.log("[engine] providers:", runtime.providers.map((provider) => provider.name).join(", ") || "none");

  await runtime.start();
  const app = createApp(runtime);
  const port = config.environment.port;
  const server = app.listen(port, () => {
    console.log(`[engine] operator API listening on http://localhost:${port}`);
  });

  const shutdown = (signal: string) => {
    console.log(`[engine] ${signal} received, shutting down`);
    server.close();
    runtime.stop().catch((error) => {
      console.error("[engine] shutdown failed:", error);
      process.exitCode = 1;
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error) => {
  console.error("[engine] fatal error:", error);
  process.exitCode = 1;
});
