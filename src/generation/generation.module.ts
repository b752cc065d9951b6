import { Module } from "@nestjs/common";
import { ContentGeneratorService } from "./content-generator.service";
import {
	AnthropicTextGenerationClient,
	TEXT_GENERATION_CLIENT,
} from "./text-generation.client";
import { CONTRACTS_CONFIG, ContractsConfig } from "../config/contracts.config";

@Module({
	providers: [
		{
			provide: TEXT_GENERATION_CLIENT,
			inject: [CONTRACTS_CONFIG],
			useFactory: (config: ContractsConfig) =>
				new AnthropicTextGenerationClient(config.generation),
		},
		ContentGeneratorService,
	],
	exports: [ContentGeneratorService],
})
export class GenerationModule {}
