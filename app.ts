import cors from "cors";
import express, { type Express } from "express";
import pinoHttp from "pino-http";
import type { DataSource } from "typeorm";
import type { AppConfig } from "./config";
import { errorHandler, notFoundHandler } from "./errors";
import { log, type Logger } from "./logger";
import { glossaryRouter } from "./routes/glossary";
import { healthRouter } from "./routes/health";
import { historyRouter } from "./routes/history";
import { likesRouter } from "./routes/likes";

export interface AppDeps {
  /** Must be initialized before requests arrive; /health and /ready report when it is not. */
  dataSource: DataSource;
  config: Pick<AppConfig, "apiPrefix" | "corsOrigin" | "historyMode" | "version">;
  logger?: Logger;
}

export function createApp({ dataSource, config, logger = log }: AppDeps): Express {
  const app = express();
  app.disable("x-powered-by");

  app.use(pinoHttp({ logger }));
  app.use(cors({ origin: config.corsOrigin }));
  app.use(express.json({ limit: "1mb" }));

  app.get("/", (_req, res) => {
    res.type("text/plain").send("Hello world!");
  });
  app.get("/ping", (_req, res) => {
    res.type("text/plain").send("pong");
  });
  app.use(healthRouter(dataSource, config.version));

  app.use(
    config.apiPrefix,
    glossaryRouter({ dataSource, historyMode: config.historyMode }),
    likesRouter(dataSource),
    historyRouter(dataSource)
  );

  app.use(notFoundHandler);
  app.use(errorHandler(logger));
  return app;
}
