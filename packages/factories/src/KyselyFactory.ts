import type { Insertable, Kysely, Selectable } from 'kysely';
import {
  type Association,
  type AssociationDefinition,
  type AssociationInput,
  pendingAssociation,
  resolveAssociation,
  toAssociation,
} from './Association';
import {
  FactoryInsertError,
  MissingPrimaryKeyError,
  RequiredAssociationError,
} from './errors';
import { Factory } from './Factory';
import { type FakerFactory, faker } from './faker';
import { type Logger, getDefaultLogger } from './logger';
import {
  type SequenceCounter,
  type SequenceFn,
  defaultSequence,
} from './sequence';

/**
 * Association fields of a table factory, keyed by field name.
 */
export type KyselyAssociations<DB> = Record<
  string,
  AssociationDefinition<unknown, unknown, Kysely<DB>>
>;

/**
 * Union of the foreign key columns owned by a set of associations.
 */
export type ForeignKeysOf<Associations> = {
  [K in keyof Associations]: Associations[K] extends { foreignKey: infer FK extends string }
    ? FK
    : never;
}[keyof Associations];

/**
 * Plain column values of a table factory. Foreign keys written by
 * associations are left out.
 */
export type KyselyFactoryAttributes<
  DB,
  TableName extends keyof DB,
  Associations,
> = Partial<Omit<Insertable<DB[TableName]>, ForeignKeysOf<Associations>>>;

/**
 * Everything `with` accepts: plain column values and association inputs.
 */
export type KyselyFactoryOverrides<
  DB,
  TableName extends keyof DB,
  Associations,
> = KyselyFactoryAttributes<DB, TableName, Associations> & {
  [K in keyof Associations]?: AssociationInput<Associations[K]>;
};

/**
 * Values handed to a definition's `defaults` function.
 */
export interface FactoryDefaultsContext {
  faker: FakerFactory;
  /** Draws from the definition's counter, or `defaultSequence` */
  sequence: SequenceFn;
}

export interface KyselyFactoryDefinition<
  DB,
  TableName extends keyof DB & string,
  PrimaryKey extends keyof Selectable<DB[TableName]> & string,
  Associations extends KyselyAssociations<DB>,
> {
  /** Table the factory inserts into */
  table: TableName;
  /** Column holding the identifier returned by `idForModel` */
  primaryKey: PrimaryKey;
  /** Default column values, evaluated again for every insert */
  defaults?: (
    context: FactoryDefaultsContext,
  ) => KyselyFactoryAttributes<DB, TableName, Associations>;
  /** "Belongs to" fields declared with `belongsTo` */
  associations?: Associations;
  logger?: Logger;
  /** Counter used by `context.sequence`, defaults to `defaultSequence` */
  sequence?: SequenceCounter;
}

type KyselyAssociation<DB> = Association<unknown, unknown, Kysely<DB>>;

/**
 * Factory for a single Kysely table.
 *
 * Instances are immutable: `set` and `with` return a new factory, so a default
 * factory can be shared freely between tests. Association fields resolve to
 * the foreign key column declared with `belongsTo`; a persisted parent is
 * shared as is, a parent factory is inserted once per insert of the child.
 *
 * @template DB - The database schema type
 * @template TableName - The table this factory inserts into
 * @template PrimaryKey - The primary key column of the table
 * @template Associations - The association fields of the factory
 *
 * @example
 * ```typescript
 * const define = KyselyFactory.forDatabase<Database>();
 *
 * const countryFactory = define({
 *   table: 'countries',
 *   primaryKey: 'id',
 *   defaults: () => ({ name: 'Denmark' }),
 * });
 *
 * const cityFactory = define({
 *   table: 'cities',
 *   primaryKey: 'id',
 *   defaults: () => ({ name: 'Copenhagen' }),
 *   associations: {
 *     country: belongsTo(() => countryFactory, 'countryId'),
 *   },
 * });
 *
 * const netherlands = await countryFactory.set('name', 'Netherlands').insert(db);
 * const amsterdam = await cityFactory
 *   .set('name', 'Amsterdam')
 *   .set('country', netherlands)
 *   .insert(db);
 * ```
 */
export class KyselyFactory<
  DB,
  TableName extends keyof DB & string,
  PrimaryKey extends keyof Selectable<DB[TableName]> & string,
  Associations extends KyselyAssociations<DB>,
> extends Factory<
  Selectable<DB[TableName]>,
  Selectable<DB[TableName]>[PrimaryKey],
  Kysely<DB>
> {
  /**
   * Returns a function defining table factories for one database schema.
   * The table, primary key and associations are inferred from each definition.
   *
   * @template DB - The database schema type
   */
  static forDatabase<DB>() {
    return <
      TableName extends keyof DB & string,
      PrimaryKey extends keyof Selectable<DB[TableName]> & string,
      Associations extends KyselyAssociations<DB> = {},
    >(
      definition: KyselyFactoryDefinition<
        DB,
        TableName,
        PrimaryKey,
        Associations
      >,
    ): KyselyFactory<DB, TableName, PrimaryKey, Associations> =>
      new KyselyFactory(definition);
  }

  private constructor(
    private readonly definition: KyselyFactoryDefinition<
      DB,
      TableName,
      PrimaryKey,
      Associations
    >,
    private readonly overrides: Readonly<Record<string, unknown>> = {},
    private readonly associations: ReadonlyMap<
      string,
      KyselyAssociation<DB> | null
    > = new Map(),
  ) {
    super();
  }

  /**
   * Returns a factory with one field changed.
   *
   * For association fields, pass an inserted parent to share it, a parent
   * factory to insert a new parent, or `null` for an optional association.
   *
   * @example
   * ```typescript
   * cityFactory.set('name', 'The Hague');
   * cityFactory.set('country', netherlands);
   * cityFactory.set('country', countryFactory.set('name', 'Belgium'));
   * ```
   */
  set<K extends keyof Associations & string>(
    key: K,
    value: AssociationInput<Associations[K]>,
  ): KyselyFactory<DB, TableName, PrimaryKey, Associations>;
  set<
    K extends keyof KyselyFactoryAttributes<DB, TableName, Associations> &
      string,
  >(
    key: K,
    value: KyselyFactoryAttributes<DB, TableName, Associations>[K],
  ): KyselyFactory<DB, TableName, PrimaryKey, Associations>;
  set(
    key: string,
    value: unknown,
  ): KyselyFactory<DB, TableName, PrimaryKey, Associations> {
    return this.assign([[key, value]]);
  }

  /**
   * Returns a factory with several fields changed at once.
   * Setting a field to `undefined` restores its default.
   *
   * @example
   * ```typescript
   * cityFactory.with({ name: 'Rotterdam', country: netherlands });
   * ```
   */
  with(
    overrides: KyselyFactoryOverrides<DB, TableName, Associations>,
  ): KyselyFactory<DB, TableName, PrimaryKey, Associations> {
    return this.assign(Object.entries(overrides));
  }

  /**
   * Plain column values the next insert would write, defaults merged with
   * overrides. Foreign keys are not included since resolving them may insert.
   */
  attributes(): Record<string, unknown> {
    const counter = this.definition.sequence ?? defaultSequence;
    const defaults = this.definition.defaults?.({
      faker,
      sequence: <T>(format: (value: number) => T) => counter.sequence(format),
    });

    return { ...defaults, ...this.overrides };
  }

  /**
   * Inserts the record after resolving every association in declaration order.
   * Database errors are logged and rethrown unchanged.
   *
   * @param connection - Kysely instance or transaction
   * @returns The inserted row
   * @throws FactoryInsertError when the database returns no row
   */
  async insert(connection: Kysely<DB>): Promise<Selectable<DB[TableName]>> {
    const { table } = this.definition;
    const foreignKeys: Record<string, unknown> = {};

    for (const [name, definition] of Object.entries(
      this.associationDefinitions(),
    )) {
      const association = this.associationFor(name, definition);
      foreignKeys[definition.foreignKey] =
        association === null
          ? null
          : await resolveAssociation(association, connection, this.logger);
    }

    const data = { ...this.attributes(), ...foreignKeys };
    const model = await this.write(connection, data).catch((err: unknown) => {
      this.logger.error({ table, err }, 'Factory insert failed');
      throw err;
    });

    this.logger.debug(
      { table, id: this.idForModel(model) },
      'Inserted factory row',
    );

    return model;
  }

  /**
   * Returns the primary key value of an inserted row.
   *
   * @throws MissingPrimaryKeyError when the column is empty
   */
  idForModel(
    model: Selectable<DB[TableName]>,
  ): Selectable<DB[TableName]>[PrimaryKey] {
    const { table, primaryKey } = this.definition;
    const id = model[primaryKey];

    if (id === null || id === undefined) {
      throw new MissingPrimaryKeyError(table, primaryKey);
    }

    return id;
  }

  clone(): KyselyFactory<DB, TableName, PrimaryKey, Associations> {
    return new KyselyFactory(
      this.definition,
      { ...this.overrides },
      new Map(this.associations),
    );
  }

  private get logger(): Logger {
    return this.definition.logger ?? getDefaultLogger();
  }

  private associationDefinitions(): KyselyAssociations<DB> {
    return this.definition.associations ?? {};
  }

  /**
   * Assigned association, or the default one: the parent's default factory
   * for required fields, `null` for optional ones.
   */
  private associationFor(
    name: string,
    definition: AssociationDefinition<unknown, unknown, Kysely<DB>>,
  ): KyselyAssociation<DB> | null {
    const assigned = this.associations.get(name);
    if (assigned !== undefined) {
      return assigned;
    }

    return definition.optional ? null : pendingAssociation(definition.parent());
  }

  private assign(
    entries: Iterable<[string, unknown]>,
  ): KyselyFactory<DB, TableName, PrimaryKey, Associations> {
    const { table } = this.definition;
    const definitions = this.associationDefinitions();
    const overrides: Record<string, unknown> = { ...this.overrides };
    const associations = new Map(this.associations);

    for (const [key, value] of entries) {
      if (!Object.hasOwn(definitions, key)) {
        if (value === undefined) {
          delete overrides[key];
        } else {
          overrides[key] = value;
        }
        continue;
      }

      const definition = definitions[key];

      if (value === undefined) {
        associations.delete(key);
      } else if (value === null) {
        if (!definition.optional) {
          throw new RequiredAssociationError(table, key);
        }
        associations.set(key, null);
      } else {
        associations.set(key, toAssociation(value, definition));
      }
    }

    return new KyselyFactory(this.definition, overrides, associations);
  }

  private async write(
    connection: Kysely<DB>,
    data: Record<string, unknown>,
  ): Promise<Selectable<DB[TableName]>> {
    const { table } = this.definition;
    const result = await connection
      .insertInto(table)
      .values(data as Insertable<DB[TableName]>)
      .returningAll()
      .executeTakeFirst();

    if (!result) {
      throw new FactoryInsertError(table);
    }

    return result as Selectable<DB[TableName]>;
  }
}
