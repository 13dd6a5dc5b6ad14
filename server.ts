import "dotenv/config";
import type { Server } from "http";
import type { DataSource } from "typeorm";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { createDataSource } from "./data-source";
import { log } from "./logger";

const SHUTDOWN_TIMEOUT_MS = 10_000;

function enableGracefulShutdown(server: Server, dataSource: DataSource): void {
  let closing = false;

  const onSignal = (sig: NodeJS.Signals) => {
    if (closing) return;
    closing = true;
    log.info({ sig }, "shutdown requested, closing HTTP server");
    const forced = setTimeout(() => {
      log.error("forced exit after shutdown timeout");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);

    server.close((closeErr) => {
      if (closeErr) log.error({ err: closeErr }, "HTTP server close failed");
      dataSource
        .destroy()
        .then(() => {
          clearTimeout(forced);
          log.info("closed cleanly");
          process.exit(closeErr ? 1 : 0);
        })
        .catch((err: unknown) => {
          clearTimeout(forced);
          log.error({ err }, "database close failed");
          process.exit(1);
        });
    });
  };

  for (const sig of ["SIGINT", "SIGTERM"] as const) process.on(sig, onSignal);
}

const config = loadConfig();
log.level = config.logLevel;
const dataSource = createDataSource(config.db);

dataSource
  .initialize()
  .then(() => {
    log.info({ driver: config.db.type, historyMode: config.historyMode }, "Database initialized");

    const app = createApp({ dataSource, config });
    const server = app.listen(config.port, config.host, () => {
      log.info(`Server running at http://${config.host}:${config.port}`);
    });
    enableGracefulShutdown(server, dataSource);
  })
  .catch((err: unknown) => {
    log.fatal({ err }, "DB Error");
    process.exit(1);
  });
