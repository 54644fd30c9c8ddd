import { Test, TestingModule } from '@nestjs/testing';
import { Opportunity } from './interfaces/opportunity.interface';
import { RecommendationSet } from './interfaces/recommendation.interface';
import { ParlayService } from './parlay.service';
import { RecommendationsController } from './recommendations.controller';
import { RecommendationsService, emptyRecommendationSet } from './recommendations.service';
import { ValueBettingService } from './value.betting.service';

describe('RecommendationsController', () => {
  let controller: RecommendationsController;
  const recommendFromSource = jest.fn<Promise<RecommendationSet>, [number?, (string | number)?]>();
  const recommendAll = jest.fn<RecommendationSet, [Opportunity[]]>();
  const getFavoriteParlays = jest.fn();
  const report = jest.fn();

  beforeEach(async () => {
    recommendFromSource.mockReset().mockResolvedValue(emptyRecommendationSet());
    recommendAll.mockReset().mockReturnValue(emptyRecommendationSet());
    getFavoriteParlays.mockReset().mockReturnValue([]);
    report.mockReset().mockReturnValue({ valueBets: [] });

    const module: TestingModule = await Test.createTestingModule({
      controllers: [RecommendationsController],
      providers: [
        { provide: RecommendationsService, useValue: { recommendFromSource, recommendAll } },
        { provide: ParlayService, useValue: { getFavoriteParlays } },
        { provide: ValueBettingService, useValue: { report } },
      ],
    }).compile();

    controller = module.get<RecommendationsController>(RecommendationsController);
  });

  it('treats zero values as defaults', async () => {
    await controller.GetRecommendations({ limit: 0, sport: '' });

    expect(recommendFromSource).toHaveBeenCalledWith(undefined, undefined);
  });

  it('passes limit and sport through', async () => {
    await controller.GetRecommendations({ limit: 20, sport: 'NBA' });

    expect(recommendFromSource).toHaveBeenCalledWith(20, 'NBA');
  });

  it('recommends from the supplied opportunities', () => {
    const opportunities: Opportunity[] = [{ id: '1', teamName: 'Lakers', sport: 'NBA', odds: 2.0 }];

    controller.RecommendParlays({ opportunities });
    controller.RecommendParlays({ opportunities: [] });

    expect(recommendAll).toHaveBeenNthCalledWith(1, opportunities);
    expect(recommendAll).toHaveBeenNthCalledWith(2, []);
  });

  it('maps favorite parlay options', () => {
    const response = controller.GetFavoriteParlays({
      opportunities: [],
      legCount: 4,
      minOdds: 0,
      minWinProb: 45,
    });

    expect(response).toEqual({ favoriteParlays: [] });
    expect(getFavoriteParlays).toHaveBeenCalledWith([], {
      legCount: 4,
      minOdds: undefined,
      minWinProb: 45,
    });
  });

  it('maps value bet options', () => {
    const response = controller.FindValueBets({
      opportunities: [],
      minEdge: 0.1,
      confidenceThreshold: 0,
      maxBets: 3,
      maxLegs: 0,
    });

    expect(response).toEqual({ valueBets: [] });
    expect(report).toHaveBeenCalledWith([], {
      minEdge: 0.1,
      confidenceThreshold: undefined,
      maxBets: 3,
      maxLegs: undefined,
    });
  });
});
