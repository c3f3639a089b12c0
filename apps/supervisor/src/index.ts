import "dotenv/config";
import { App, createApp } from "./app";
import { loadConfig } from "./config";

const TAG = "[switchyard]";

let app: App | null = null;

async function main() {
  const settings = loadConfig();
  console.log(
    `${TAG} starting supervisor... (profile: ${settings.profile}, transport: ${settings.transport})`,
  );

  if (!settings.mockWorkers) {
    console.warn(
      `${TAG} WARNING: MOCK_WORKERS is not set. Runs will only complete if worker agents are listening on the transport.`,
    );
  }

  app = await createApp(settings);
  const server = app.server;
  await new Promise<void>((resolve) => server.listen(settings.port, resolve));

  console.log(`${TAG} supervisor ready on :${settings.port}`);
}

async function shutdown(signal: string) {
  console.log(`${TAG} ${signal} received, shutting down...`);
  if (app) await app.close();
  console.log(`${TAG} shutdown complete`);
  process.exit(0);
}

process.on("SIGTERM", () => {
  shutdown("SIGTERM").catch((err) => {
    console.error(`${TAG} shutdown failed:`, err);
    process.exit(1);
  });
});
process.on("SIGINT", () => {
  shutdown("SIGINT").catch((err) => {
    console.error(`${TAG} shutdown failed:`, err);
    process.exit(1);
  });
});

main().catch((err) => {
  console.error(`${TAG} fatal:`, err);
  process.exit(1);
});
