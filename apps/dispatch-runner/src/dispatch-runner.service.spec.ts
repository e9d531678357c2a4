import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { WebhookService, WebhookSiteService } from '@fakehook/common/webhook';
import { ERRORS } from '@fakehook/common/errors';
import { DispatchResult } from '@fakehook/common/types';
import { DispatchRunnerService } from './dispatch-runner.service';

describe('DispatchRunnerService', () => {
  const result: DispatchResult = {
    url: 'https://webhook.test/test-token',
    status_code: 200,
    records_sent: 3,
    bytes_sent: 512,
    duration_ms: 12,
    attempts: 1,
  };

  let webhookService: { dispatch: jest.Mock };
  let webhookSiteService: { createToken: jest.Mock };

  async function createRunner(
    config: Record<string, unknown>,
  ): Promise<DispatchRunnerService> {
    const moduleRef = await Test.createTestingModule({
      providers: [
        DispatchRunnerService,
        { provide: WebhookService, useValue: webhookService },
        { provide: WebhookSiteService, useValue: webhookSiteService },
        { provide: ConfigService, useValue: new ConfigService(config) },
      ],
    }).compile();

    return moduleRef.get(DispatchRunnerService);
  }

  beforeEach(() => {
    webhookService = { dispatch: jest.fn().mockResolvedValue(result) };
    webhookSiteService = { createToken: jest.fn() };
  });

  it('should dispatch the configured count to WEBHOOK_URL', async () => {
    const runner = await createRunner({
      dispatchCount: 3,
      webhookUrl: 'https://webhook.test/test-token',
    });

    await expect(runner.run()).resolves.toEqual(result);
    expect(webhookService.dispatch).toHaveBeenCalledWith(
      { count: 3 },
      'https://webhook.test/test-token',
    );
    expect(webhookSiteService.createToken).not.toHaveBeenCalled();
  });

  it('should create a webhook.site token when asked and no URL is set', async () => {
    webhookSiteService.createToken.mockResolvedValue({
      uuid: 'fresh-token',
      url: 'https://webhook.test/fresh-token',
      created_at: '2024-06-15 10:00:00',
    });
    const runner = await createRunner({
      dispatchCount: 5,
      dispatchCreateToken: true,
    });

    await runner.run();

    expect(webhookService.dispatch).toHaveBeenCalledWith(
      { count: 5 },
      'https://webhook.test/fresh-token',
    );
  });

  it('should leave the URL unset when no token is requested', async () => {
    webhookService.dispatch.mockRejectedValue(ERRORS.WebhookUrlMissing());
    const runner = await createRunner({ dispatchCount: 1 });

    await expect(runner.run()).rejects.toThrow(
      'No webhook URL given and WEBHOOK_URL is not configured',
    );
    expect(webhookService.dispatch).toHaveBeenCalledWith({ count: 1 }, undefined);
  });
});
