/**
 * Fakehook Person Types
 * Shape of the synthetic person records sent to webhooks
 */

export interface Person {
  first_name: string;
  last_name: string;
  age: number;
  birth_date: string; // YYYY-MM-DD
  address: string;
  phone: string;
  email: string;
}

export interface PersonGenerationOptions {
  seed?: number;
  locale?: string;
  referenceDate?: Date; // Ages are computed against this date, default now
  minAge?: number;
  maxAge?: number;
}

export interface GenerationRequest {
  count?: number;
  seed?: number;
  locale?: string;
}

export interface GeneratedPeople {
  seed: number | null;
  locale: string;
  count: number;
  people: Person[];
}
