import { ConfigModule, ConfigService } from "@nestjs/config";
import {
	MiddlewareConsumer,
	Module,
	NestModule,
	RequestMethod,
} from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { EventEmitterModule } from "@nestjs/event-emitter";

import { ContractsConfigModule } from "./config/contracts-config.module";
import { ContractsModule } from "./contracts/contracts.module";
import { PipelineModule } from "./pipeline/pipeline.module";
import { WebhooksModule } from "./webhooks/webhooks.module";
import { HealthModule } from "./health.module";
import { RequestLoggingMiddleware } from "./common/middlewares/request-logging.middleware";
import { buildDataSourceConfig } from "./db/DataSource";

@Module({
	imports: [
		ConfigModule.forRoot({ isGlobal: true }),
		ContractsConfigModule,
		EventEmitterModule.forRoot(),
		TypeOrmModule.forRootAsync({
			inject: [ConfigService],
			useFactory: (config: ConfigService) => buildDataSourceConfig(config),
		}),
		ContractsModule,
		PipelineModule,
		WebhooksModule,
		HealthModule,
	],
})
export class AppModule implements NestModule {
	configure(consumer: MiddlewareConsumer) {
		consumer
			.apply(RequestLoggingMiddleware)
			.exclude({ path: "api/v1/health", method: RequestMethod.GET })
			.forRoutes({ path: "*", method: RequestMethod.ALL });
	}
}
