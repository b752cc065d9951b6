import { Module } from "@nestjs/common";

import { ContractPipelineService } from "./contract-pipeline.service";
import { ContractPipelineController } from "./contract-pipeline.controller";
import { AggregationModule } from "../aggregation/aggregation.module";
import { GenerationModule } from "../generation/generation.module";
import { RenderingModule } from "../rendering/rendering.module";
import { SignatureModule } from "../signature/signature.module";
import { ContractsModule } from "../contracts/contracts.module";

@Module({
	imports: [
		AggregationModule,
		GenerationModule,
		RenderingModule,
		SignatureModule,
		ContractsModule,
	],
	providers: [ContractPipelineService],
	controllers: [ContractPipelineController],
})
export class PipelineModule {}
