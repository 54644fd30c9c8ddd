import {Injectable} from "@nestjs/common";
import {Cron, CronExpression} from "@nestjs/schedule";
import {JsonLogger, LoggerFactory} from "json-logger-service";
import {OpportunityExpiryService} from "./workers/opportunity.expiry.service";

@Injectable()
export class CronjobService {

    private readonly logger: JsonLogger = LoggerFactory.createLogger(CronjobService.name);

    constructor(
        private readonly opportunityExpiryService: OpportunityExpiryService,
    ) {
    }

    @Cron(CronExpression.EVERY_10_MINUTES)
    async processExpiredOpportunities(): Promise<void> {

        try {

            await this.opportunityExpiryService.taskCloseExpiredOpportunities()
            this.logger.info("done running processExpiredOpportunities ")

        } catch (e) {

            this.logger.error(" error running processExpiredOpportunities " + String(e))
        }
    }

}
