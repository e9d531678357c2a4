import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { validateSync } from 'class-validator';
import { ErrorCode, FakehookError } from '@fakehook/common/errors';
import { PeopleService } from './people.service';
import { PersonFactory } from './person.factory';

describe('PeopleService', () => {
  const referenceDate = new Date('2024-06-15T00:00:00Z');
  let service: PeopleService;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        PeopleService,
        {
          provide: ConfigService,
          useValue: new ConfigService({
            defaultBatchSize: 4,
            maxBatchSize: 50,
            fakerLocale: 'en',
            fakerSeed: 99,
          }),
        },
      ],
    }).compile();

    service = moduleRef.get(PeopleService);
  });

  it('should generate the requested number of valid people', () => {
    const result = service.generate({ count: 5, seed: 7 }, referenceDate);

    expect(result.count).toBe(5);
    expect(result.seed).toBe(7);
    expect(result.locale).toBe('en');
    expect(result.people).toHaveLength(5);
    for (const person of result.people) {
      expect(validateSync(person)).toEqual([]);
    }
  });

  it('should delegate to PersonFactory with the same parameters', () => {
    const result = service.generate({ count: 3, seed: 11 }, referenceDate);

    expect(result.people).toEqual(
      PersonFactory.createMany(3, { seed: 11, locale: 'en', referenceDate }),
    );
  });

  it('should fall back to configured batch size and seed', () => {
    const result = service.generate({}, referenceDate);

    expect(result.count).toBe(4);
    expect(result.seed).toBe(99);
    expect(result.people).toHaveLength(4);
  });

  it('should reject a count above the configured maximum', () => {
    expect(() => service.generate({ count: 51 })).toThrow(
      'count must be between 1 and 50',
    );
  });

  it('should reject an unsupported locale', () => {
    expect.assertions(2);

    try {
      service.generate({ count: 1, locale: 'xx' });
    } catch (error) {
      expect(error).toBeInstanceOf(FakehookError);
      expect(error).toMatchObject({ code: ErrorCode.ValidationError });
    }
  });
});
