import { plainToInstance } from 'class-transformer';
import { validateSync, ValidationError } from 'class-validator';
import { PersonDto } from './person.dto';

export function describeValidationErrors(errors: ValidationError[]): string {
  return errors
    .map(
      (error) =>
        `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`,
    )
    .join('; ');
}

/**
 * Returns the records as PersonDto instances when value is an array of valid
 * person records, or null otherwise.
 */
export function parsePeople(value: unknown): PersonDto[] | null {
  if (!Array.isArray(value)) {
    return null;
  }

  const people: PersonDto[] = [];
  for (const item of value) {
    if (typeof item !== 'object' || item === null || Array.isArray(item)) {
      return null;
    }
    const person = plainToInstance(PersonDto, item);
    if (validateSync(person, { forbidUnknownValues: true }).length > 0) {
      return null;
    }
    people.push(person);
  }
  return people;
}
