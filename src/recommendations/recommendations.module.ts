import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RANDOM_SOURCE } from '../constants';
import { DiagnosticsModule } from '../diagnostics/diagnostics.module';
import { OpportunitiesModule } from '../opportunities/opportunities.module';
import { MathRandomSource, RandomSource, SeededRandomSource } from './random';
import { ParlayService } from './parlay.service';
import { RecommendationsController } from './recommendations.controller';
import { RecommendationsService } from './recommendations.service';
import { ValueBettingService } from './value.betting.service';

@Module({
  imports: [OpportunitiesModule, DiagnosticsModule],
  controllers: [RecommendationsController],
  providers: [
    {
      provide: RANDOM_SOURCE,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): RandomSource => {
        const seed = configService.get<string>('RECOMMENDER_RANDOM_SEED');
        if (seed !== undefined && seed !== '' && Number.isFinite(Number(seed))) {
          return new SeededRandomSource(Number(seed));
        }
        return new MathRandomSource();
      },
    },
    ParlayService,
    RecommendationsService,
    ValueBettingService,
  ],
  exports: [RecommendationsService],
})
export class RecommendationsModule {}
