import { ensureTracer, shutdownTracers } from "@album-insights/telemetry";

import { SERVICE_NAME, TELEMETRY_CONSOLE_EXPORT } from "./config";
import { logger } from "./logger";
import { startHttpServer } from "./server";

async function bootstrap() {
  ensureTracer(SERVICE_NAME, { consoleExport: TELEMETRY_CONSOLE_EXPORT });
  const server = await startHttpServer();

  const shutdownSignals: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

  const shutdown = async (signal: NodeJS.Signals) => {
    logger.info({ signal }, "Shutting down chart API");
    try {
      await server.close();
      await shutdownTracers();
      logger.info("Chart API stopped");
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, "Failed to shut down chart API");
      process.exit(1);
    }
  };

  shutdownSignals.forEach((signal) => {
    process.on(signal, () => {
      void shutdown(signal);
    });
  });
}

bootstrap().catch((error) => {
  logger.fatal({ err: error }, "Chart API failed to start");
  process.exit(1);
});
