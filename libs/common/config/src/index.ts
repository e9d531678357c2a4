export * from './config.module';
export { default as configuration } from './configuration';
