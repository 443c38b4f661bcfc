import type { TestAPI } from 'vitest';

/**
 * Fixtures added to every test wrapped by a transaction isolator.
 *
 * @template Transaction - The transaction type specific to the database driver
 */
export interface DatabaseFixtures<Transaction> {
  /**
   * The database transaction available to the test.
   * Factories should insert through it so their rows are rolled back.
   */
  trx: Transaction;
}

/**
 * Transaction isolation levels. SQLite ignores them.
 */
export enum IsolationLevel {
  READ_UNCOMMITTED = 'read uncommitted',
  READ_COMMITTED = 'read committed',
  REPEATABLE_READ = 'repeatable read',
  SERIALIZABLE = 'serializable',
}

/**
 * Base class for running every Vitest test inside a transaction that is
 * rolled back once the test finishes, whatever its outcome.
 *
 * @template Connection - The database connection type
 * @template Transaction - The transaction type
 */
export abstract class VitestTransactionIsolator<Connection, Transaction> {
  /**
   * Runs `fn` inside a transaction. The transaction must roll back when `fn` throws.
   */
  abstract transact(
    conn: Connection,
    level: IsolationLevel | undefined,
    fn: (trx: Transaction) => Promise<void>,
  ): Promise<void>;

  /**
   * @param api - The Vitest test API (usually `it` or `test` from vitest)
   */
  constructor(private readonly api: TestAPI) {}

  /**
   * Creates a version of the test API whose tests receive a `trx` fixture.
   *
   * @param conn - The connection the transactions are opened on
   * @param setup - Optional function run inside the transaction before each test
   * @param level - Optional isolation level
   */
  wrapVitestWithTransaction(
    conn: Connection,
    setup?: (trx: Transaction) => Promise<void>,
    level?: IsolationLevel,
  ) {
    return this.api.extend<DatabaseFixtures<Transaction>>({
      // biome-ignore lint/correctness/noEmptyPattern: vitest reads fixture dependencies from the pattern
      trx: async ({}, use: (value: Transaction) => Promise<void>) => {
        class TestRollback extends Error {
          constructor() {
            super('Test rollback');
            this.name = 'TestRollback';
          }
        }

        let failed = false;
        let testError: unknown;

        try {
          await this.transact(conn, level, async (transaction) => {
            try {
              await setup?.(transaction);
              await use(transaction);
            } catch (error) {
              failed = true;
              testError = error;
            }

            // Always throw to trigger rollback
            throw new TestRollback();
          });
        } catch (error) {
          if (!(error instanceof TestRollback)) {
            throw error;
          }

          if (failed) {
            throw testError;
          }
        }
      },
    });
  }
}

