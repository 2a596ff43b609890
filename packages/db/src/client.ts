import { drizzle, type PostgresJsDatabase } from "drizzle-orm/postgres-js";
import postgres from "postgres";

let _client: postgres.Sql | undefined;
let _db: PostgresJsDatabase | undefined;

/**
 * Lazily initialized database client.
 * The JSON token store never touches Postgres, so DATABASE_URL is only
 * required once something actually queries through `db`.
 */
export const db: PostgresJsDatabase = new Proxy({} as PostgresJsDatabase, {
  get(_target, prop, receiver) {
    if (!_db) {
      const connectionString = process.env.DATABASE_URL;
      if (!connectionString) {
        throw new Error("DATABASE_URL is not set");
      }
      _client = postgres(connectionString, {
        max: 2,
        idle_timeout: 20,
        connect_timeout: 10,
      });
      _db = drizzle(_client);
    }
    return Reflect.get(_db, prop, receiver);
  },
});

/**
 * Close the connection pool so a one-shot CLI run can exit.
 * No-op when the client was never initialized.
 */
export async function closeDb(): Promise<void> {
  if (!_client) return;
  const client = _client;
  _client = undefined;
  _db = undefined;
  await client.end({ timeout: 5 });
}
