import { describe, expect, it } from 'vitest';
import {
  FactoryConfigError,
  FactoryError,
  FactoryInsertError,
  MissingPrimaryKeyError,
  RequiredAssociationError,
  isFactoryError,
} from '../errors';

describe('FactoryError', () => {
  it('should carry its class name and details', () => {
    const error = new FactoryInsertError('users');

    expect(error).toBeInstanceOf(FactoryError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('FactoryInsertError');
    expect(error.message).toBe('Failed to insert into users');
    expect(error.details).toEqual({ table: 'users' });
    expect(error.table).toBe('users');
    expect(error.isFactoryError).toBe(true);
  });

  it('should keep the cause it was given', () => {
    const cause = new Error('connection reset');

    expect(new FactoryError('boom', { cause }).cause).toBe(cause);
    expect(new FactoryInsertError('users').cause).toBeUndefined();
  });

  it('should serialize to JSON', () => {
    const error = new MissingPrimaryKeyError('cities', 'id');

    expect(error.toJSON()).toEqual({
      name: 'MissingPrimaryKeyError',
      message: 'Record for cities has no value in primary key "id"',
      details: { table: 'cities', primaryKey: 'id' },
      stack: error.stack,
    });
  });

  it('should name the association that cannot be null', () => {
    const error = new RequiredAssociationError('users', 'homeCity');

    expect(error.message).toBe('Association "homeCity" of users cannot be null');
    expect(error.table).toBe('users');
    expect(error.association).toBe('homeCity');
  });

  it('should join configuration issues', () => {
    const error = new FactoryConfigError(['first', 'second']);

    expect(error.message).toBe('Invalid factory configuration: first; second');
    expect(error.issues).toEqual(['first', 'second']);
  });
});

describe('isFactoryError', () => {
  it('should detect factory errors', () => {
    expect(isFactoryError(new FactoryInsertError('users'))).toBe(true);
    expect(isFactoryError(new FactoryError('boom'))).toBe(true);
  });

  it('should reject other values', () => {
    expect(isFactoryError(new Error('boom'))).toBe(false);
    expect(isFactoryError({ isFactoryError: true })).toBe(false);
    expect(isFactoryError(undefined)).toBe(false);
  });
});
