/**
 * Person Factory
 * Builds synthetic person records on top of @faker-js/faker
 */

import { Faker, allLocales, base, en } from '@faker-js/faker';
import { ERRORS } from '@fakehook/common/errors';
import { PersonGenerationOptions } from '@fakehook/common/types';
import { PersonDto } from './person.dto';
import { ageOn, birthDateWindow, startOfUtcDay, toIsoDate } from './birth-date';

export type FakerLocale = Exclude<keyof typeof allLocales, 'base'>;

export function isSupportedLocale(locale: string): locale is FakerLocale {
  return (
    locale !== 'base' &&
    Object.prototype.hasOwnProperty.call(allLocales, locale)
  );
}

export class PersonFactory {
  static readonly DEFAULT_LOCALE: FakerLocale = 'en';
  static readonly DEFAULT_MIN_AGE = 18;
  static readonly DEFAULT_MAX_AGE = 80;

  /**
   * Create a Faker instance for the locale, falling back to English for
   * definitions the locale lacks. A seeded instance yields a repeatable
   * sequence.
   */
  static createFaker(locale: string = PersonFactory.DEFAULT_LOCALE, seed?: number): Faker {
    if (!isSupportedLocale(locale)) {
      throw ERRORS.ValidationError(`Unsupported faker locale: ${locale}`, 'locale');
    }
    if (seed !== undefined && (!Number.isInteger(seed) || seed < 0)) {
      throw ERRORS.ValidationError(`seed must be a non-negative integer, got ${seed}`, 'seed');
    }

    const faker = new Faker({ locale: [allLocales[locale], en, base] });
    if (seed !== undefined) {
      faker.seed(seed);
    }
    return faker;
  }

  static create(options: PersonGenerationOptions = {}): PersonDto {
    return PersonFactory.createMany(1, options)[0];
  }

  static createMany(count: number, options: PersonGenerationOptions = {}): PersonDto[] {
    const minAge = options.minAge ?? PersonFactory.DEFAULT_MIN_AGE;
    const maxAge = options.maxAge ?? PersonFactory.DEFAULT_MAX_AGE;

    if (!Number.isInteger(count) || count < 0) {
      throw ERRORS.ValidationError(`count must be a non-negative integer, got ${count}`, 'count');
    }
    if (minAge < 0 || maxAge < minAge) {
      throw ERRORS.ValidationError(
        `Invalid age range: ${minAge}..${maxAge}`,
        'age',
      );
    }

    const faker = PersonFactory.createFaker(options.locale, options.seed);
    const referenceDate = options.referenceDate ?? new Date();

    return Array.from({ length: count }, () =>
      PersonFactory.build(faker, referenceDate, minAge, maxAge),
    );
  }

  private static build(
    faker: Faker,
    referenceDate: Date,
    minAge: number,
    maxAge: number,
  ): PersonDto {
    const sex = faker.person.sexType();
    const firstName = faker.person.firstName(sex);
    const lastName = faker.person.lastName(sex);
    const birthDate = startOfUtcDay(
      faker.date.between(birthDateWindow(referenceDate, minAge, maxAge)),
    );

    const person = new PersonDto();
    person.first_name = firstName;
    person.last_name = lastName;
    person.age = ageOn(birthDate, referenceDate);
    person.birth_date = toIsoDate(birthDate);
    person.address = PersonFactory.address(faker);
    person.phone = faker.phone.number();
    person.email = faker.internet.email({ firstName, lastName }).toLowerCase();
    return person;
  }

  private static address(faker: Faker): string {
    const street = faker.location.streetAddress();
    const city = faker.location.city();

    // Locales such as en_HK mark postcodes as not applicable
    if (faker.rawDefinitions.location?.postcode === null) {
      return `${street}, ${city}`;
    }
    return `${street}, ${city} ${faker.location.zipCode()}`;
  }
}
