import { Inject, Injectable, Logger } from "@nestjs/common";

import { buildContractPrompt } from "./contract-prompt";
import type { ResolvedContractTerms } from "./contract-terms";
import {
	TEXT_GENERATION_CLIENT,
	TextGenerationClient,
} from "./text-generation.client";
import type { AggregatedContext } from "../aggregation/external-records";
import { CONTRACTS_CONFIG, ContractsConfig } from "../config/contracts.config";
import { ContractPipelineError, describeFailure } from "../common/errors";

export type GeneratedContract = {
	markup: string;
	prompt: string;
};

const CODE_FENCE = /^```[a-zA-Z]*\s*\n([\s\S]*?)\n?```\s*$/;

/** Models like to wrap markup in a fenced block; the renderer wants bare markup. */
export function unwrapCodeFence(output: string): string {
	const trimmed = output.trim();
	const match = CODE_FENCE.exec(trimmed);
	return match ? match[1].trim() : trimmed;
}

@Injectable()
export class ContentGeneratorService {
	private readonly logger = new Logger(ContentGeneratorService.name);

	constructor(
		@Inject(TEXT_GENERATION_CLIENT)
		private readonly textGeneration: TextGenerationClient,
		@Inject(CONTRACTS_CONFIG) private readonly config: ContractsConfig,
	) {}

	async generate(
		context: AggregatedContext,
		terms: ResolvedContractTerms,
		statusHint?: string,
	): Promise<GeneratedContract> {
		const prompt = buildContractPrompt({
			context,
			terms,
			currency: this.config.generation.currency,
			statusHint,
		});

		let output: string;
		try {
			output = await this.textGeneration.generate(prompt);
		} catch (err) {
			throw new ContractPipelineError(
				"GENERATION_FAILED",
				`Text generation failed: ${describeFailure(err)}`,
				{},
				{ cause: err },
			);
		}

		const markup = unwrapCodeFence(output);
		if (markup === "") {
			throw new ContractPipelineError(
				"GENERATION_FAILED",
				"Text generation returned an empty document",
			);
		}
		this.logger.log(`Generated contract document (${markup.length} chars)`);
		return { markup, prompt };
	}
}
