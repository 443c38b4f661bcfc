import { Factory } from './Factory';
import type { Logger } from './logger';

const associationBrand: unique symbol = Symbol('rowsmith.association');

/**
 * Association to a parent record that has already been inserted.
 * The identifier is copied when the association is created.
 */
export interface ExistingAssociation<Model, Id> {
  readonly [associationBrand]: true;
  readonly kind: 'existing';
  readonly model: Model;
  readonly id: Id;
}

/**
 * Association to a parent that still has to be inserted.
 */
export interface PendingAssociation<Model, Id, Connection> {
  readonly [associationBrand]: true;
  readonly kind: 'pending';
  readonly factory: Factory<Model, Id, Connection>;
}

/**
 * A "belongs to" reference from a child factory to its parent: either a
 * persisted record shared by reference, or a factory owned by this association.
 */
export type Association<Model, Id, Connection> =
  | ExistingAssociation<Model, Id>
  | PendingAssociation<Model, Id, Connection>;

/**
 * Creates an association to an inserted record.
 *
 * @param model - The persisted parent
 * @param id - The parent's identifier, usually `factory.idForModel(model)`
 */
export function existingAssociation<Model, Id>(
  model: Model,
  id: Id,
): ExistingAssociation<Model, Id> {
  return Object.freeze({
    [associationBrand]: true as const,
    kind: 'existing' as const,
    model,
    id,
  });
}

/**
 * Creates an association owning a copy of `factory`.
 * Later changes to `factory` do not reach the association.
 */
export function pendingAssociation<Model, Id, Connection>(
  factory: Factory<Model, Id, Connection>,
): PendingAssociation<Model, Id, Connection> {
  return Object.freeze({
    [associationBrand]: true as const,
    kind: 'pending' as const,
    factory: factory.clone(),
  });
}

export function isAssociation<Model, Id, Connection>(
  value: unknown,
): value is Association<Model, Id, Connection> {
  return (
    typeof value === 'object' &&
    value !== null &&
    associationBrand in value &&
    value[associationBrand] === true
  );
}

/**
 * Turns an association into the identifier of its parent.
 *
 * An existing association returns its stored identifier without touching the
 * database. A pending association inserts a clone of its factory, exactly once
 * per call, and returns the new record's identifier. The association is never
 * modified.
 *
 * @example
 * ```typescript
 * const shared = existingAssociation(denmark, denmark.id);
 * await resolveAssociation(shared, db); // denmark.id, no insert
 *
 * const fresh = pendingAssociation(countryFactory.set('name', 'Norway'));
 * await resolveAssociation(fresh, db); // id of a newly inserted country
 * ```
 */
export async function resolveAssociation<Model, Id, Connection>(
  association: Association<Model, Id, Connection>,
  connection: Connection,
  logger?: Logger,
): Promise<Id> {
  if (association.kind === 'existing') {
    const { kind, id } = association;
    logger?.debug({ kind, id }, 'Resolved association');
    return id;
  }

  const model = await association.factory.clone().insert(connection);
  const id = association.factory.idForModel(model);
  logger?.debug({ kind: association.kind, id }, 'Resolved association');

  return id;
}

/**
 * Declaration of an association field on a factory definition.
 *
 * @template Model - The parent model type
 * @template Id - The parent identifier type
 * @template Connection - The connection shared by parent and child
 * @template ForeignKey - The child column receiving the parent identifier
 * @template Optional - Whether the field accepts `null`
 */
export interface AssociationDefinition<
  Model,
  Id,
  Connection,
  ForeignKey extends string = string,
  Optional extends boolean = boolean,
> {
  /** Returns the parent's default factory */
  readonly parent: () => Factory<Model, Id, Connection>;
  readonly foreignKey: ForeignKey;
  readonly optional: Optional;
}

/**
 * Declares a "belongs to" association.
 * Required associations default to inserting the parent's default factory;
 * optional ones default to `null`.
 *
 * @param parent - Function returning the parent's default factory
 * @param foreignKey - Column of the child table holding the parent identifier
 *
 * @example
 * ```typescript
 * const cityFactory = define({
 *   table: 'cities',
 *   primaryKey: 'id',
 *   defaults: () => ({ name: 'Copenhagen' }),
 *   associations: {
 *     country: belongsTo(() => countryFactory, 'countryId'),
 *   },
 * });
 * ```
 */
export function belongsTo<Model, Id, Connection, ForeignKey extends string>(
  parent: () => Factory<Model, Id, Connection>,
  foreignKey: ForeignKey,
): AssociationDefinition<Model, Id, Connection, ForeignKey, false>;
export function belongsTo<Model, Id, Connection, ForeignKey extends string>(
  parent: () => Factory<Model, Id, Connection>,
  foreignKey: ForeignKey,
  options: { optional: true },
): AssociationDefinition<Model, Id, Connection, ForeignKey, true>;
export function belongsTo<Model, Id, Connection, ForeignKey extends string>(
  parent: () => Factory<Model, Id, Connection>,
  foreignKey: ForeignKey,
  options?: { optional: true },
): AssociationDefinition<Model, Id, Connection, ForeignKey, boolean> {
  return {
    parent,
    foreignKey,
    optional: options?.optional ?? false,
  };
}

/**
 * Values accepted when assigning an association field: the persisted parent,
 * a parent factory, an association, or `null` when the field is optional.
 */
export type AssociationInput<Definition> =
  Definition extends AssociationDefinition<
    infer Model,
    infer Id,
    infer Connection,
    string,
    infer Optional
  >
    ?
        | Model
        | Factory<Model, Id, Connection>
        | Association<Model, Id, Connection>
        | (Optional extends true ? null : never)
    : never;

/**
 * Converts an assigned value into the association it stands for.
 * `idForModel` is taken from the definition's parent factory.
 */
export function toAssociation<Model, Id, Connection>(
  value:
    | Model
    | Factory<Model, Id, Connection>
    | Association<Model, Id, Connection>,
  definition: AssociationDefinition<Model, Id, Connection>,
): Association<Model, Id, Connection> {
  if (isAssociation<Model, Id, Connection>(value)) {
    return value;
  }

  if (value instanceof Factory) {
    return pendingAssociation<Model, Id, Connection>(value);
  }

  return existingAssociation(value, definition.parent().idForModel(value));
}
