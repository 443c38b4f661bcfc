import Database from 'better-sqlite3';
import { CamelCasePlugin, type Generated, Kysely, SqliteDialect } from 'kysely';
import { vi } from 'vitest';
import { belongsTo } from '../src/Association';
import { KyselyFactory } from '../src/KyselyFactory';
import type { Logger } from '../src/logger';
import type { SequenceCounter } from '../src/sequence';

export interface TestDatabase {
  countries: {
    id: Generated<number>;
    name: string;
  };
  cities: {
    id: Generated<number>;
    name: string;
    countryId: number;
  };
  users: {
    id: Generated<number>;
    name: string;
    email: string;
    homeCityId: number;
    currentCityId: number | null;
  };
}

/**
 * Creates a Kysely instance over a fresh in-memory SQLite database
 */
export function createKyselyDb(): Kysely<TestDatabase> {
  const database = new Database(':memory:');
  database.pragma('foreign_keys = ON');

  return new Kysely<TestDatabase>({
    dialect: new SqliteDialect({ database }),
    plugins: [new CamelCasePlugin()],
  });
}

/**
 * Creates test tables using Kysely
 */
export async function createTestTables(db: Kysely<TestDatabase>): Promise<void> {
  await db.schema
    .createTable('countries')
    .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
    .addColumn('name', 'text', (col) => col.notNull().unique())
    .execute();

  await db.schema
    .createTable('cities')
    .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('country_id', 'integer', (col) =>
      col.notNull().references('countries.id'),
    )
    .execute();

  await db.schema
    .createTable('users')
    .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('email', 'text', (col) => col.notNull().unique())
    .addColumn('home_city_id', 'integer', (col) =>
      col.notNull().references('cities.id'),
    )
    .addColumn('current_city_id', 'integer', (col) =>
      col.references('cities.id'),
    )
    .execute();
}

export async function countRows(
  db: Kysely<TestDatabase>,
  table: keyof TestDatabase,
): Promise<number> {
  const { count } = await db
    .selectFrom(table)
    .select((eb) => eb.fn.countAll<number>().as('count'))
    .executeTakeFirstOrThrow();

  return Number(count);
}

/**
 * Defines the country, city and user factories used across the specs
 */
export function defineTestFactories(
  options: { logger?: Logger; sequence?: SequenceCounter } = {},
) {
  const define = KyselyFactory.forDatabase<TestDatabase>();

  const countryFactory = define({
    table: 'countries',
    primaryKey: 'id',
    defaults: ({ sequence }) => ({
      name: sequence((n) => `Country ${n}`),
    }),
    ...options,
  });

  const cityFactory = define({
    table: 'cities',
    primaryKey: 'id',
    defaults: () => ({ name: 'Copenhagen' }),
    associations: {
      country: belongsTo(() => countryFactory, 'countryId'),
    },
    ...options,
  });

  const userFactory = define({
    table: 'users',
    primaryKey: 'id',
    defaults: ({ sequence }) => ({
      name: 'Bob',
      email: sequence((n) => `user${n}@example.com`),
    }),
    associations: {
      homeCity: belongsTo(() => cityFactory, 'homeCityId'),
      currentCity: belongsTo(() => cityFactory, 'currentCityId', {
        optional: true,
      }),
    },
    ...options,
  });

  return { countryFactory, cityFactory, userFactory };
}

/**
 * Creates a mock Logger for testing
 */
export function createMockLogger() {
  return {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  } satisfies Logger;
}
