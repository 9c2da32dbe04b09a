import express from "express";
import next from "next";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { PatientService } from "./service";
import { FileRecordStore } from "./store";

async function main(): Promise<void> {
  const config = loadConfig();

  const store = new FileRecordStore(config.dataFile, {
    maxRetries: config.storeMaxRetries,
    minDelayMs: config.storeMinDelayMs,
  });
  const service = new PatientService(store);

  const count = await service.init();
  console.log(`Loaded ${count} patients from ${config.dataFile}`);

  const ui = next({ dev: config.dev });
  const handle = ui.getRequestHandler();
  await ui.prepare();

  const server = express();
  server.use(createApp(service));

  // Let Next handle everything else
  server.all("*", (req, res) => handle(req, res));

  const listener = server.listen(config.port, () => {
    console.log(
      `Server ready on http://localhost:${config.port} (dev=${config.dev})`
    );
  });

  const shutdown = (signal: string) => {
    console.log(`Received ${signal}, waiting for pending store writes...`);
    listener.close();
    service
      .close()
      .then(() => process.exit(0))
      .catch((err) => {
        console.error("Shutdown failed:", err);
        process.exit(1);
      });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
  console.error("Fatal server error:", err);
  process.exit(1);
});
