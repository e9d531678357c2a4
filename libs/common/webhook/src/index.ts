export * from './webhook.service';
export * from './webhook-site.service';
export * from './webhook.module';
