import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";

import { RentalContract } from "./rental-contract.entity";
import { RentalContractsService } from "./rental-contracts.service";
import { RentalContractsController } from "./rental-contracts.controller";
import { ServerSentEventsService } from "../common/server-sent-events.service";

@Module({
	imports: [TypeOrmModule.forFeature([RentalContract])],
	providers: [RentalContractsService, ServerSentEventsService],
	controllers: [RentalContractsController],
	exports: [RentalContractsService],
})
export class ContractsModule {}
