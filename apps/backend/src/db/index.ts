import { drizzle } from "drizzle-orm/node-postgres";
import pg from "pg";

import { loadConfig } from "../config/env.js";
import * as schema from "./schema.js";

// The pool connects lazily, on the first query
const pool = new pg.Pool({ connectionString: loadConfig().databaseUrl });

export const db = drizzle(pool, { schema });

export type Database = typeof db;
