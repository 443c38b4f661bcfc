import type { Kysely, Transaction } from 'kysely';
import type { TestAPI } from 'vitest';
import { VitestKyselyTransactionIsolator } from './VitestKyselyTransactionIsolator';
import type { IsolationLevel } from './VitestTransactionIsolator';

/**
 * Vitest helpers for Kysely. Kept apart from the main entry point so that
 * importing factories never loads vitest.
 */

export { VitestKyselyTransactionIsolator } from './VitestKyselyTransactionIsolator';
export {
  IsolationLevel,
  type DatabaseFixtures,
} from './VitestTransactionIsolator';

/**
 * Creates a wrapped Vitest test API with automatic transaction rollback for Kysely.
 * Each test runs in a transaction that is rolled back after completion.
 *
 * @param api - The Vitest test API (usually `it` from vitest)
 * @param db - The Kysely instance the transactions are opened on
 * @param setup - Optional function run inside the transaction before each test
 * @param level - Optional isolation level
 *
 * @example
 * ```typescript
 * import { it as base } from 'vitest';
 * import { wrapVitestKyselyTransaction } from '@rowsmith/factories/kysely';
 *
 * const it = wrapVitestKyselyTransaction<Database>(base, db, createTables);
 *
 * it('shares a country between cities', async ({ trx }) => {
 *   const denmark = await countryFactory.insert(trx);
 *   const [a, b] = await cityFactory.set('country', denmark).insertMany(2, trx);
 *   expect(a.countryId).toBe(b.countryId);
 * });
 * ```
 */
export function wrapVitestKyselyTransaction<Database>(
  api: TestAPI,
  db: Kysely<Database>,
  setup?: (trx: Transaction<Database>) => Promise<void>,
  level?: IsolationLevel,
) {
  const wrapper = new VitestKyselyTransactionIsolator<Database>(api);

  return wrapper.wrapVitestWithTransaction(db, setup, level);
}
