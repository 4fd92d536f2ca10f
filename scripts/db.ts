#!/usr/bin/env tsx
/**
 * Database migrations and seeds for the MySQL persistence driver.
 *
 * Usage:
 *   npm run db:migrate
 *   npm run db:rollback
 *   npm run db:seed
 *
 * The profile follows NODE_ENV (development when unset).
 */
import { knex } from 'knex';
import knexConfig from '../knexfile.js';

type Command = 'latest' | 'rollback' | 'seed';

function parseCommand(value: string | undefined): Command {
  if (value === 'latest' || value === 'rollback' || value === 'seed') {
    return value;
  }
  console.error('Usage: tsx scripts/db.ts <latest|rollback|seed>');
  process.exit(1);
}

async function main(): Promise<void> {
  const command = parseCommand(process.argv[2]);
  const profile = process.env.NODE_ENV ?? 'development';
  const config = knexConfig[profile];
  if (!config) {
    throw new Error(`No knex profile for NODE_ENV=${profile}`);
  }

  const db = knex(config);
  try {
    if (command === 'latest') {
      const [batch, applied] = await db.migrate.latest();
      console.log(`Batch ${batch}: ${applied.length} migration(s) applied`);
    } else if (command === 'rollback') {
      const [batch, reverted] = await db.migrate.rollback();
      console.log(`Batch ${batch}: ${reverted.length} migration(s) rolled back`);
    } else {
      const [ran] = await db.seed.run();
      console.log(`${ran.length} seed file(s) run`);
    }
  } finally {
    await db.destroy();
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
