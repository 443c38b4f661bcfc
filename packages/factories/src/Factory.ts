/**
 * Abstract base class for every buildable record type.
 * A factory holds the values of a record that has not been inserted yet, plus
 * whatever it needs to insert it, and can be treated uniformly by association
 * resolution regardless of the model it produces.
 *
 * Implementations must attempt a write on every `insert` call. Sharing a parent
 * between several children is done by the caller, through `existing`
 * associations, never by caching inside a factory.
 *
 * @template Model - The persisted record type returned by `insert`
 * @template Id - The primary identifier type of `Model`
 * @template Connection - The database handle passed to `insert`
 *
 * @example
 * ```typescript
 * class TagFactory extends Factory<Tag, number, Store> {
 *   constructor(private readonly label = 'default') {
 *     super();
 *   }
 *
 *   async insert(store: Store) {
 *     return store.insert('tags', { label: this.label });
 *   }
 *
 *   idForModel(tag: Tag) {
 *     return tag.id;
 *   }
 *
 *   clone() {
 *     return new TagFactory(this.label);
 *   }
 * }
 * ```
 */
export abstract class Factory<Model, Id, Connection> {
  /**
   * Inserts the record, resolving the factory's own associations first.
   * Errors raised by the database are not caught.
   *
   * @param connection - The connection or transaction to write through
   * @returns The persisted record
   */
  abstract insert(connection: Connection): Promise<Model>;

  /**
   * Returns the primary identifier of a persisted record.
   * Must not touch the database.
   */
  abstract idForModel(model: Model): Id;

  /**
   * Returns an independent copy of this factory.
   */
  abstract clone(): Factory<Model, Id, Connection>;

  /**
   * Inserts several records one after another.
   *
   * @param count - Number of records to insert
   * @param connection - The connection or transaction to write through
   * @param customize - Optional function returning the factory to use for each index
   * @returns The persisted records in insertion order
   *
   * @example
   * ```typescript
   * const cities = await cityFactory.insertMany(3, db, (factory, idx) =>
   *   factory.set('name', `City ${idx + 1}`).set('country', denmark),
   * );
   * ```
   */
  async insertMany(
    count: number,
    connection: Connection,
    customize?: (factory: this, idx: number) => Factory<Model, Id, Connection>,
  ): Promise<Model[]> {
    const models: Model[] = [];

    for (let idx = 0; idx < count; idx++) {
      const factory = customize ? customize(this, idx) : this;
      models.push(await factory.insert(connection));
    }

    return models;
  }
}

/**
 * Extracts the model type of a factory.
 */
export type FactoryModel<F> = F extends Factory<infer Model, infer _Id, infer _C>
  ? Model
  : never;

/**
 * Extracts the identifier type of a factory.
 */
export type FactoryId<F> = F extends Factory<infer _M, infer Id, infer _C>
  ? Id
  : never;
