import {Injectable} from "@nestjs/common";
import {ConfigService} from "@nestjs/config";
import dayjs from 'dayjs';
import {JsonLogger, LoggerFactory} from "json-logger-service";
import {OpportunitiesService} from "../../opportunities/opportunities.service";

@Injectable()
export class OpportunityExpiryService {

    private readonly logger: JsonLogger = LoggerFactory.createLogger(OpportunityExpiryService.name);

    constructor(
        private readonly opportunitiesService: OpportunitiesService,
        private readonly configService: ConfigService,
    ) {
    }

    // closes open opportunities whose event started more than the grace period ago
    async taskCloseExpiredOpportunities(now: Date = new Date()): Promise<number> {

        const graceMinutes = Number(this.configService.get<number>('OPPORTUNITY_EXPIRY_GRACE_MINUTES', 0)) || 0;
        const cutoff = dayjs(now).subtract(graceMinutes, 'minute').toDate();

        const closed = await this.opportunitiesService.closeExpired(cutoff);

        if (closed > 0) {
            this.logger.info("closed " + closed + " expired opportunities before " + cutoff.toISOString())
        }

        return closed;
    }
}
