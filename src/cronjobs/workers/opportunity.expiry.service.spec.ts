import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { OpportunitiesService } from '../../opportunities/opportunities.service';
import { OpportunityExpiryService } from './opportunity.expiry.service';

describe('OpportunityExpiryService', () => {
  const closeExpired = jest.fn<Promise<number>, [Date]>();
  let settings: Record<string, string>;
  let service: OpportunityExpiryService;

  beforeEach(async () => {
    closeExpired.mockReset();
    settings = {};

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        OpportunityExpiryService,
        { provide: OpportunitiesService, useValue: { closeExpired } },
        {
          provide: ConfigService,
          useValue: { get: (key: string, defaultValue?: unknown) => settings[key] ?? defaultValue },
        },
      ],
    }).compile();

    service = module.get<OpportunityExpiryService>(OpportunityExpiryService);
  });

  it('closes opportunities that started before now', async () => {
    closeExpired.mockResolvedValue(2);
    const now = new Date('2026-03-01T12:00:00.000Z');

    await expect(service.taskCloseExpiredOpportunities(now)).resolves.toBe(2);
    expect(closeExpired).toHaveBeenCalledWith(now);
  });

  it('subtracts the configured grace period', async () => {
    closeExpired.mockResolvedValue(0);
    settings.OPPORTUNITY_EXPIRY_GRACE_MINUTES = '30';

    await service.taskCloseExpiredOpportunities(new Date('2026-03-01T12:00:00.000Z'));

    expect(closeExpired).toHaveBeenCalledWith(new Date('2026-03-01T11:30:00.000Z'));
  });
});
