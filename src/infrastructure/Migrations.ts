// =============================================================================
// Database Migrations
// =============================================================================
//
// Run once at startup, before the HTTP server accepts traffic.
// PgMigrator records applied migrations in its own table, so re-running is
// a no-op.
//
import { Effect } from "effect"
import { Migrator, SqlClient } from "@effect/sql"
import { PgMigrator } from "@effect/sql-pg"

const createSubscriptionsTable = Effect.gen(function* () {
  const sql = yield* SqlClient.SqlClient
  yield* sql`
    CREATE TABLE subscriptions (
      id uuid NOT NULL PRIMARY KEY,
      email text NOT NULL UNIQUE,
      name text NOT NULL,
      subscribed_at timestamptz NOT NULL
    )
  `
})

// [id, name, load]; PgMigrator runs those above the last applied id, in order
const migrations: ReadonlyArray<Migrator.ResolvedMigration> = [
  [1, "create_subscriptions_table", Effect.succeed(createSubscriptionsTable)]
]

export const loader: Migrator.Loader = Effect.succeed(migrations)

export const MigrationsLive = PgMigrator.layer({ loader })
