import { Injectable, OnModuleDestroy } from "@nestjs/common";
import { drizzle, type NodePgDatabase, type NodePgQueryResultHKT } from "drizzle-orm/node-postgres";
import type { PgDatabase } from "drizzle-orm/pg-core";
import { Pool } from "pg";
import { getApiEnv } from "../common/env";
import * as schema from "./schema";

export type DatabaseSchema = typeof schema;

/** Either the root connection or an open transaction; both expose the same query builder. */
export type DbClient = PgDatabase<NodePgQueryResultHKT, DatabaseSchema>;

@Injectable()
export class DatabaseService implements OnModuleDestroy {
  readonly pool: Pool;
  readonly db: NodePgDatabase<DatabaseSchema>;

  constructor() {
    const env = getApiEnv();
    this.pool = new Pool({
      connectionString: env.DATABASE_URL,
      max: env.DB_POOL_MAX,
      ssl: env.DB_SSL ? { rejectUnauthorized: false } : undefined,
    });
    this.db = drizzle(this.pool, { schema });
  }

  async ping() {
    await this.pool.query("SELECT 1");
  }

  async onModuleDestroy() {
    await this.pool.end();
  }
}
