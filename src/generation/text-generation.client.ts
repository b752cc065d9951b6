import Anthropic from "@anthropic-ai/sdk";
import type { TextGenerationConfig } from "../config/contracts.config";

export const TEXT_GENERATION_CLIENT = Symbol("TEXT_GENERATION_CLIENT");

/** A single prompt in, opaque text out. */
export interface TextGenerationClient {
	generate(prompt: string): Promise<string>;
}

export class AnthropicTextGenerationClient implements TextGenerationClient {
	private readonly client: Anthropic | null;

	constructor(private readonly config: TextGenerationConfig) {
		this.client = config.apiKey
			? new Anthropic({
					apiKey: config.apiKey,
					timeout: config.timeoutMs,
					// the pipeline does not retry generation
					maxRetries: 0,
				})
			: null;
	}

	async generate(prompt: string): Promise<string> {
		if (!this.client) {
			throw new Error("TEXT_GENERATION_API_KEY is not set");
		}
		const message = await this.client.messages.create({
			model: this.config.model,
			max_tokens: this.config.maxTokens,
			messages: [{ role: "user", content: prompt }],
		});
		return message.content
			.map((block) => (block.type === "text" ? block.text : ""))
			.join("");
	}
}
