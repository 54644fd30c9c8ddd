import {Module} from "@nestjs/common";
import {TypeOrmModule} from "@nestjs/typeorm";
import {Opportunity} from "../entity/opportunity.entity";
import {OpportunitiesService} from "./opportunities.service";

@Module({
    imports: [
        TypeOrmModule.forFeature([Opportunity]),
    ],
    providers: [OpportunitiesService],
    exports: [OpportunitiesService]
})
export class OpportunitiesModule {
}
