import { loadConfig } from "./config.js";
import { buildContainer } from "./container.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const { app, background, watcher } = await buildContainer(config);

  const server = app.listen(config.port, () => {
    console.log(`[server] listening on port ${config.port}`);
  });

  if (watcher) await watcher.start();

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    console.log(`[server] ${signal} received, shutting down`);
    // no new webhooks or uploads once the watcher starts stopping
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    console.log("[server] closed");
    if (watcher) await watcher.stop();
    await background.drain();
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        console.error("[server] Shutdown failed:", err);
        process.exit(1);
      });
    });
  }
}

main().catch((err: unknown) => {
  console.error("[server] Fatal:", err);
  process.exit(1);
});
