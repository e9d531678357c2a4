export * from './person.types';
export * from './webhook.types';
