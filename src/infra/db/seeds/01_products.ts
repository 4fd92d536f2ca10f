/**
 * Sample catalog for local development.
 * Run: npm run db:seed
 */
import type { Knex } from 'knex';

export async function seed(knex: Knex): Promise<void> {
  await knex('products').del();

  await knex('products').insert([
    { name: 'Desk Lamp' },
    { name: 'Office Chair' },
    { name: 'Standing Desk' },
    { name: 'Monitor Arm' },
  ]);
}
