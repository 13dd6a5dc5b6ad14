import { DataSource } from "typeorm";
import type { DbConfig } from "./config";
import { GlossaryEntry, GlossaryHistory, Like } from "./entity";

const entities = [GlossaryEntry, GlossaryHistory, Like];

/**
 * Builds the (not yet initialized) data source for the configured driver.
 * Postgres connections come from a `pg` pool bounded by `poolSize`;
 * better-sqlite3 is meant for local runs and the test suite.
 */
export function createDataSource(db: DbConfig): DataSource {
  if (db.type === "better-sqlite3") {
    return new DataSource({
      type: "better-sqlite3",
      database: db.path,
      synchronize: db.synchronize,
      logging: false,
      entities,
    });
  }

  return new DataSource({
    type: "postgres",
    url: db.url,
    host: db.host,
    port: db.port,
    username: db.username,
    password: db.password,
    database: db.database,
    synchronize: db.synchronize,
    logging: false,
    entities,
    extra: { max: db.poolSize },
  });
}
