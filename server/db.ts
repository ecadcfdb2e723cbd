/**
 * Database Connection
 *
 * Purpose:
 * Creates the Drizzle ORM instance over Neon's HTTP driver.
 * The connection string comes from AppConfig; nothing here reads process.env.
 *
 * Layer: Infrastructure
 */

import { drizzle, type NeonHttpDatabase } from "drizzle-orm/neon-http";
import { neon } from "@neondatabase/serverless";
import * as schema from "@shared/schema";

export type Database = NeonHttpDatabase<typeof schema>;

export function createDb(databaseUrl: string): Database {
  if (!databaseUrl) {
    throw new Error("DATABASE_URL is not set");
  }
  const queryClient = neon(databaseUrl);
  return drizzle(queryClient, { schema });
}
