import { ErrorCode } from './error-codes';
import { FakehookError } from './fakehook-error';

export const ERRORS = {
  // Generation errors
  GenerationFailed: (reason: string, metadata?: Record<string, unknown>) =>
    new FakehookError({
      code: ErrorCode.GenerationFailed,
      message: `Generated record failed validation: ${reason}`,
      httpStatusCode: 500,
      metadata,
    }),

  // Webhook errors
  WebhookUrlMissing: () =>
    new FakehookError({
      code: ErrorCode.WebhookUrlMissing,
      message: 'No webhook URL given and WEBHOOK_URL is not configured',
      httpStatusCode: 400,
    }),

  WebhookDispatchFailed: (url: string, upstreamStatus?: number, e?: Error) =>
    new FakehookError({
      code: ErrorCode.WebhookDispatchFailed,
      message: upstreamStatus
        ? `Webhook responded with status ${upstreamStatus}`
        : `Webhook request failed: ${e?.message ?? 'unknown error'}`,
      httpStatusCode: 502,
      resource: url,
      originalError: e,
      metadata: upstreamStatus ? { upstreamStatus } : undefined,
    }),

  // webhook.site inspection errors
  TokenNotFound: (tokenId: string, e?: Error) =>
    new FakehookError({
      code: ErrorCode.TokenNotFound,
      message: `Webhook token '${tokenId}' not found`,
      httpStatusCode: 404,
      resource: tokenId,
      originalError: e,
    }),

  CapturedRequestNotFound: (tokenId: string) =>
    new FakehookError({
      code: ErrorCode.CapturedRequestNotFound,
      message: `No captured request with person records for token '${tokenId}'`,
      httpStatusCode: 404,
      resource: tokenId,
    }),

  InspectionFailed: (operation: string, e?: Error) =>
    new FakehookError({
      code: ErrorCode.InspectionFailed,
      message: `webhook.site request failed: ${operation}`,
      httpStatusCode: 502,
      resource: operation,
      originalError: e,
    }),

  // General
  ValidationError: (message: string, field?: string) =>
    new FakehookError({
      code: ErrorCode.ValidationError,
      message,
      httpStatusCode: 400,
      resource: field,
    }),
};
