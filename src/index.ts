import { buildApp } from "./server.js";
import { loadRuntimeConfig } from "./infra/config.js";
import { createLogger } from "./infra/logger.js";

const config = loadRuntimeConfig();
const logger = createLogger({ level: config.logLevel, environment: config.environment });
const app = buildApp(config, { logger });

app
  .listen({ port: config.port, host: config.host })
  .then(() => {
    logger.info({ host: config.host, port: config.port }, "webhook settlement gateway listening");
  })
  .catch((error: unknown) => {
    logger.fatal({ err: error }, "failed to start server");
    process.exit(1);
  });
