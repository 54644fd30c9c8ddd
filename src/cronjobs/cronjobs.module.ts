import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { OpportunitiesModule } from '../opportunities/opportunities.module';
import { CronjobController } from './cronjob.controller';
import { CronjobService } from './cronjob.service';
import { OpportunityExpiryService } from './workers/opportunity.expiry.service';

@Module({
  imports: [
    ScheduleModule.forRoot(),
    OpportunitiesModule,
  ],
  providers: [
    OpportunityExpiryService,
    CronjobService,
  ],
  controllers: [CronjobController],
})
export class CronJobModule {}
