import {Module} from '@nestjs/common';
import {ConfigModule} from '@nestjs/config';
import {TypeOrmModule} from "@nestjs/typeorm";
import 'dotenv/config'
import {CronJobModule} from "./cronjobs/cronjobs.module";
import {DiagnosticsModule} from "./diagnostics/diagnostics.module";
import {Opportunity} from "./entity/opportunity.entity";
import {RecommendationsModule} from "./recommendations/recommendations.module";

@Module({
    imports: [
        ConfigModule.forRoot({
            isGlobal: true,
        }),
        DiagnosticsModule,
        RecommendationsModule,
        CronJobModule,
        TypeOrmModule.forRoot({
          type: 'mysql',
          host: process.env.DB_HOST,
          port: parseInt(process.env.DB_PORT ?? '3306', 10),
          username: process.env.DB_USERNAME,
          password: process.env.DB_PASSWORD,
          database: process.env.DB_NAME,
          entities: [Opportunity],
          synchronize: true,
        }),
    ],
})
export class AppModule {
}
