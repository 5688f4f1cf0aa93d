/**
 * Shared database connection
 *
 * Builds the drizzle instance over a Neon serverless pool. Only constructed
 * when STORAGE_BACKEND or SEARCH_BACKEND is "postgres".
 */

import { drizzle } from "drizzle-orm/neon-serverless";
import { Pool, neonConfig } from "@neondatabase/serverless";
import ws from "ws";
import * as schema from "@shared/schema";

// Configure WebSocket for Neon serverless
neonConfig.webSocketConstructor = ws;

export function createDatabase(connectionString: string) {
  const pool = new Pool({ connectionString });
  return drizzle({ client: pool, schema });
}

export type Database = ReturnType<typeof createDatabase>;

// Re-export schema for convenience
export { schema };

// Re-export commonly used drizzle operators
export { eq, desc, and, inArray } from "drizzle-orm";
