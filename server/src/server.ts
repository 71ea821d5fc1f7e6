import "dotenv/config";

import { loadConfig } from "./config";
import { describeError } from "./errors";
import { createGateway } from "./gateway";
import { Logger } from "./logging/logger";
import { HttpModelBackend } from "./model/http_backend";

const log = new Logger("server");

async function main() {
  const config = loadConfig();
  Logger.configure({ level: config.logLevel, file: config.logFile });
  log.info(
    `starting - log level ${config.logLevel}, log file ${config.logFile ?? "(console only)"}, ` +
      `max concurrency ${config.maxConcurrency}, audio is never stored`,
  );

  const backend = new HttpModelBackend({ baseUrl: config.modelServiceUrl, timeoutMs: config.modelTimeoutMs });
  const gw = createGateway(config, { model: backend });

  try {
    await gw.model.load();
  } catch (e) {
    log.error(`model failed to load, not serving: ${describeError(e)}`, e);
    Logger.closeSink();
    process.exitCode = 1;
    return;
  }

  const server = gw.app.listen(config.port, config.host, () => {
    const base = `http://${config.host}:${config.port}`;
    log.info(`listening on ${base}`);
    log.info(`health check at ${base}/health`);
    log.info(`synthesis endpoint at ${base}/tts`);
  });

  const shutdown = (signal: string) => {
    log.info(`received ${signal}, shutting down`);
    server.close((err) => {
      if (err) log.error("error while closing server", err);
      log.info("server closed");
      Logger.closeSink();
      process.exit(err ? 1 : 0);
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((e) => {
  log.error(`fatal startup error: ${describeError(e)}`, e);
  process.exit(1);
});
