/**
 * Fakehook Configuration
 * Environment variables shared by the data API and the dispatch runner
 */

function parseSeed(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  if (!/^\d+$/.test(value)) {
    throw new Error(`Invalid FAKER_SEED: ${value} (expected a non-negative integer)`);
  }
  return parseInt(value, 10);
}

export default () => ({
  // Service Ports
  dataApiPort: parseInt(process.env.DATA_API_PORT || '8010', 10),

  // Outbound webhook
  webhookUrl: process.env.WEBHOOK_URL, // Optional; requests may name their own URL
  webhookTimeoutMs: parseInt(process.env.WEBHOOK_TIMEOUT_MS || '10000', 10),
  webhookRetries: parseInt(process.env.WEBHOOK_RETRIES || '0', 10),
  webhookRetryMinTimeoutMs: parseInt(
    process.env.WEBHOOK_RETRY_MIN_TIMEOUT_MS || '500',
    10,
  ),

  // webhook.site API
  webhookSiteBaseUrl: process.env.WEBHOOK_SITE_BASE_URL || 'https://webhook.site',
  webhookSiteApiKey: process.env.WEBHOOK_SITE_API_KEY,

  // Fake data generation
  fakerLocale: process.env.FAKER_LOCALE || 'en',
  fakerSeed: parseSeed(process.env.FAKER_SEED),
  defaultBatchSize: parseInt(process.env.DEFAULT_BATCH_SIZE || '10', 10),
  maxBatchSize: parseInt(process.env.MAX_BATCH_SIZE || '1000', 10),

  // Dispatch runner
  dispatchCount: parseInt(process.env.DISPATCH_COUNT || '10', 10),
  dispatchCreateToken: process.env.DISPATCH_CREATE_TOKEN === 'true',
});
