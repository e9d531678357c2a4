export enum ErrorCode {
  // Generation errors
  GenerationFailed = 'GenerationFailed',

  // Webhook errors
  WebhookUrlMissing = 'WebhookUrlMissing',
  WebhookDispatchFailed = 'WebhookDispatchFailed',

  // webhook.site inspection errors
  TokenNotFound = 'TokenNotFound',
  CapturedRequestNotFound = 'CapturedRequestNotFound',
  InspectionFailed = 'InspectionFailed',

  // General errors
  ValidationError = 'ValidationError',
}
