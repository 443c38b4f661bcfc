import { faker as baseFaker } from '@faker-js/faker';
import { sequence } from './sequence';

/**
 * Generates random timestamp fields for database records.
 * Creates a createdAt date in the past and an updatedAt date between creation and now.
 * Milliseconds are set to 0 for cleaner database storage.
 *
 * @example
 * ```typescript
 * const { createdAt, updatedAt } = timestamps();
 * ```
 */
export function timestamps(): Timestamps {
  const createdAt = baseFaker.date.past();
  const updatedAt = baseFaker.date.between({
    from: createdAt,
    to: new Date(),
  });

  createdAt.setMilliseconds(0);
  updatedAt.setMilliseconds(0);

  return { createdAt, updatedAt };
}

/**
 * Generates a reverse domain name identifier, unique within the process.
 *
 * @param suffix - Optional last segment replacing the generated one
 *
 * @example
 * ```typescript
 * identifier(); // "com.example.widget12"
 * identifier('user'); // "org.acme.user"
 * ```
 */
export function identifier(suffix?: string): string {
  return [
    baseFaker.internet.domainSuffix(),
    baseFaker.internet.domainWord(),
    suffix ? suffix : sequence((n) => baseFaker.internet.domainWord() + n),
  ].join('.');
}

/**
 * Email address that no other call in this process returns.
 *
 * @example
 * ```typescript
 * uniqueEmail(); // "user7@example.com"
 * uniqueEmail('admin'); // "admin8@example.com"
 * ```
 */
export function uniqueEmail(prefix = 'user'): string {
  return sequence((n) => `${prefix}${n}@example.com`);
}

/**
 * Enhanced faker instance with additional utility methods for testing.
 *
 * @example
 * ```typescript
 * const name = faker.person.fullName();
 * const email = faker.uniqueEmail();
 * const slug = faker.sequence((n) => `post-${n}`);
 * ```
 */
export const faker = Object.freeze(
  Object.assign({}, baseFaker, {
    timestamps,
    identifier,
    uniqueEmail,
    sequence,
  }),
);

/**
 * Type definition for timestamp fields.
 */
export type Timestamps = {
  /** The creation date */
  createdAt: Date;
  /** The last update date */
  updatedAt: Date;
};

export type FakerFactory = typeof faker;
