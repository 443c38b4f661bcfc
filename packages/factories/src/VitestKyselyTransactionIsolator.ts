import type { Kysely, Transaction } from 'kysely';
import {
  IsolationLevel,
  VitestTransactionIsolator,
} from './VitestTransactionIsolator';

const kyselyIsolationLevels = {
  [IsolationLevel.READ_UNCOMMITTED]: 'read uncommitted',
  [IsolationLevel.READ_COMMITTED]: 'read committed',
  [IsolationLevel.REPEATABLE_READ]: 'repeatable read',
  [IsolationLevel.SERIALIZABLE]: 'serializable',
} as const;

/**
 * Kysely implementation of the Vitest transaction isolator.
 *
 * @template Database - The database schema type
 *
 * @example
 * ```typescript
 * import { it as base } from 'vitest';
 *
 * const it = new VitestKyselyTransactionIsolator<Database>(base)
 *   .wrapVitestWithTransaction(db);
 *
 * it('creates a city', async ({ trx }) => {
 *   const city = await cityFactory.insert(trx);
 *   expect(city.id).toBeDefined();
 * });
 * ```
 */
export class VitestKyselyTransactionIsolator<
  Database,
> extends VitestTransactionIsolator<Kysely<Database>, Transaction<Database>> {
  async transact(
    conn: Kysely<Database>,
    level: IsolationLevel | undefined,
    fn: (trx: Transaction<Database>) => Promise<void>,
  ): Promise<void> {
    const builder = conn.transaction();

    await (
      level ? builder.setIsolationLevel(kyselyIsolationLevels[level]) : builder
    ).execute(fn);
  }
}
