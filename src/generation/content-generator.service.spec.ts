import { Test } from "@nestjs/testing";
import { ConfigService } from "@nestjs/config";
import { ContentGeneratorService, unwrapCodeFence } from "./content-generator.service";
import { TEXT_GENERATION_CLIENT } from "./text-generation.client";
import {
	CONTRACTS_CONFIG,
	loadContractsConfig,
} from "../config/contracts.config";
import { ContractPipelineError } from "../common/errors";

describe("ContentGeneratorService", () => {
	let service: ContentGeneratorService;
	const mockTextGeneration = { generate: jest.fn() };
	const config = loadContractsConfig(new ConfigService({ CURRENCY: "EUR" }));

	const context = { owner: null, client: null, equipment: [], request: null };
	const terms = {
		ownerName: "Sami",
		clientName: "Amal",
		equipment: null,
		startDate: "2025-05-01",
		endDate: "2025-05-03",
		totalValue: 0,
	};

	beforeEach(async () => {
		const moduleRef = await Test.createTestingModule({
			providers: [ContentGeneratorService],
		})
			.useMocker((token) => {
				if (token === TEXT_GENERATION_CLIENT) return mockTextGeneration;
				if (token === CONTRACTS_CONFIG) return config;
			})
			.compile();

		service = moduleRef.get(ContentGeneratorService);
		jest.clearAllMocks();
	});

	it("should return the generated markup with the prompt", async () => {
		mockTextGeneration.generate.mockResolvedValue("  <h1>Contract</h1>\n");

		const result = await service.generate(context, terms);

		expect(result.markup).toBe("<h1>Contract</h1>");
		expect(result.prompt).toContain("- Total Value: 0.00 EUR");
		expect(mockTextGeneration.generate).toHaveBeenCalledWith(result.prompt);
	});

	it("should wrap a service failure as GENERATION_FAILED", async () => {
		mockTextGeneration.generate.mockRejectedValue(new Error("overloaded"));

		await expect(service.generate(context, terms)).rejects.toMatchObject({
			code: "GENERATION_FAILED",
			detail: "Text generation failed: overloaded",
		});
	});

	it("should reject empty output", async () => {
		mockTextGeneration.generate.mockResolvedValue("```html\n```");

		const failure = service.generate(context, terms);
		await expect(failure).rejects.toBeInstanceOf(ContractPipelineError);
		await expect(failure).rejects.toMatchObject({
			code: "GENERATION_FAILED",
			detail: "Text generation returned an empty document",
		});
	});
});

describe("unwrapCodeFence", () => {
	it("should strip a fenced block", () => {
		expect(unwrapCodeFence("```html\n<p>Hi</p>\n```")).toBe("<p>Hi</p>");
	});

	it("should leave bare markup alone", () => {
		expect(unwrapCodeFence("<p>Hi</p>")).toBe("<p>Hi</p>");
	});
});
