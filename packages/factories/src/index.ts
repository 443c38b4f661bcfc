export { Factory, type FactoryId, type FactoryModel } from './Factory';
export {
  type Association,
  type AssociationDefinition,
  type AssociationInput,
  type ExistingAssociation,
  type PendingAssociation,
  belongsTo,
  existingAssociation,
  isAssociation,
  pendingAssociation,
  resolveAssociation,
  toAssociation,
} from './Association';
export {
  KyselyFactory,
  type FactoryDefaultsContext,
  type ForeignKeysOf,
  type KyselyAssociations,
  type KyselyFactoryAttributes,
  type KyselyFactoryDefinition,
  type KyselyFactoryOverrides,
} from './KyselyFactory';
export {
  SequenceCounter,
  type SequenceFn,
  defaultSequence,
  sequence,
} from './sequence';
export {
  type FakerFactory,
  type Timestamps,
  faker,
  identifier,
  timestamps,
  uniqueEmail,
} from './faker';
export {
  FactoryConfigError,
  FactoryError,
  FactoryInsertError,
  MissingPrimaryKeyError,
  RequiredAssociationError,
  isFactoryError,
} from './errors';
export { type FactoryConfig, LogLevel, parseFactoryConfig } from './config';
export {
  type CreateLoggerOptions,
  type Logger,
  createLogger,
  getDefaultLogger,
} from './logger';
