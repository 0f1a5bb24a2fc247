/**
 * Entry point — load config, replay journal, listen.
 */

import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { createDeps } from "./deps.js";
import { makeLogger } from "./logger.js";

const config = loadConfig();
const logger = makeLogger(undefined, {
  level: config.LOG_LEVEL,
  serviceName: config.SERVICE_NAME,
  nodeEnv: config.NODE_ENV,
});

const { server, ledger } = await createApp(createDeps(config, logger));
const stats = ledger.stats();

server.listen(config.PORT, () => {
  logger.info(
    { port: config.PORT, eventStore: config.EVENT_STORE, version: stats.version, works: stats.works },
    `Server listening on http://localhost:${config.PORT}`
  );
});
