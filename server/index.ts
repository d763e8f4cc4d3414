import { storage } from "./core/storage";
import { log, errorMessage } from "./core/logger";
import { validateEnvironment } from "./core/env-validation";
import { getAppConfig } from "./core/config";
import { createApp } from "./app";
import { startSchedulers, shutdownSchedulers } from "./routes/index";

// Validate environment variables before anything else
const envResult = validateEnvironment();
if (!envResult.valid) {
  process.exit(1);
}

const config = getAppConfig();
storage.saveLogSettings({ level: config.logLevel });

const { server } = createApp();

startSchedulers();

server.listen({ port: config.port, host: config.host }, () => {
  log("info", "system", `serving on port ${config.port} (Zeitzone ${config.timezone})`);
});

let isShuttingDown = false;
const shutdown = (signal: string) => {
  // Verhindere doppeltes Shutdown (z.B. SIGINT + SIGTERM gleichzeitig)
  if (isShuttingDown) return;
  isShuttingDown = true;

  log("info", "system", `🛑 Server wird heruntergefahren... (Signal: ${signal})`);

  // Falls Cleanup hängt, trotzdem nach 5s beenden
  const forceExitTimer = setTimeout(() => {
    log("warning", "system", "⚠️ Shutdown-Timeout (5s) erreicht - erzwinge Exit");
    process.exit(1);
  }, 5000);
  forceExitTimer.unref();

  try {
    shutdownSchedulers();
  } catch (error) {
    log("error", "system", "Fehler beim Stoppen der Scheduler", errorMessage(error));
  }

  server.close((error) => {
    if (error) {
      log("error", "system", "Fehler beim Schließen des HTTP-Servers", errorMessage(error));
    } else {
      log("info", "system", "✅ HTTP-Server geschlossen");
    }
    clearTimeout(forceExitTimer);
    process.exit(error ? 1 : 0);
  });
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
