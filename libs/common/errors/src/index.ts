export * from './error-codes';
export * from './fakehook-error';
export * from './fakehook-error.filter';
export * from './errors-factory';
