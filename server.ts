import { loadSettings } from "./src/config/settings";
import { createApp } from "./src/app";
import { createDatabase } from "./src/db/database";
import { logger } from "./src/utils/logger";

function startServer() {
  const settings = loadSettings();
  const db = createDatabase(settings.databasePath);
  const app = createApp(db, settings);

  const server = app.listen(settings.port, settings.host, () => {
    logger.info(`Server running on http://localhost:${settings.port}`);
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, closing server`);
    server.close(() => {
      db.close();
      process.exit(0);
    });
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

try {
  startServer();
} catch (error) {
  logger.error("Failed to start server:", error);
  process.exit(1);
}
