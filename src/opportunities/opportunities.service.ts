import {Injectable} from "@nestjs/common";
import {InjectRepository} from "@nestjs/typeorm";
import {JsonLogger, LoggerFactory} from "json-logger-service";
import {LessThan, Repository} from "typeorm";
import {OPPORTUNITY_CLOSED, OPPORTUNITY_OPEN} from "../constants";
import {Opportunity as OpportunityEntity} from "../entity/opportunity.entity";
import {americanToDecimal} from "../commons/odds";
import {Opportunity} from "../recommendations/interfaces/opportunity.interface";

@Injectable()
export class OpportunitiesService {

    private readonly logger: JsonLogger = LoggerFactory.createLogger(OpportunitiesService.name);

    constructor(
        @InjectRepository(OpportunityEntity)
        private opportunityRepository: Repository<OpportunityEntity>,
    ) {
    }

    async getOpenOpportunities(limit: number): Promise<Opportunity[]> {

        const rows = await this.opportunityRepository.find({
            where: {
                status: OPPORTUNITY_OPEN,
            },
            order: {
                event_date: 'ASC',
            },
            take: limit,
        });

        return rows.map((row) => this.getOpportunityFromRow(row));
    }

    async closeExpired(cutoff: Date): Promise<number> {

        try {

            const result = await this.opportunityRepository.update(
                {
                    status: OPPORTUNITY_OPEN,
                    event_date: LessThan(cutoff),
                },
                {
                    status: OPPORTUNITY_CLOSED,
                },
            );

            return result.affected ?? 0;

        } catch (e) {

            this.logger.error(" error closing expired opportunities " + String(e))
            throw e
        }
    }

    // odds are stored either as decimal or as an American line
    getOpportunityFromRow(row: OpportunityEntity): Opportunity {

        let odds: number | string | null = row.odds;
        if (odds === null && row.american_odds) {
            odds = americanToDecimal(row.american_odds) ?? null;
        }

        return {
            id: row.id,
            teamName: row.team_name,
            sport: row.sport_name,
            sportId: row.sport_id,
            odds: odds,
            probability: row.probability === null ? null : Number(row.probability),
            eventDate: row.event_date ? row.event_date.toISOString() : undefined,
        }
    }
}
