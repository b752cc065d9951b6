import { Inject, Injectable, Logger, NotFoundException } from "@nestjs/common";

import type {
	GenerateContractInDto,
	GenerateContractOutDto,
	SigningUrlInDto,
	SigningUrlOutDto,
} from "./dto/generate-contract.dto";
import { DataAggregatorService } from "../aggregation/data-aggregator.service";
import { ContentGeneratorService } from "../generation/content-generator.service";
import { resolveContractTerms } from "../generation/contract-terms";
import { DocumentRendererService } from "../rendering/document-renderer.service";
import { SignatureGatewayService } from "../signature/signature-gateway.service";
import { RentalContractsService } from "../contracts/rental-contracts.service";
import { CONTRACTS_CONFIG, ContractsConfig } from "../config/contracts.config";

/**
 * The synchronous path: aggregate, generate, draft, render, submit. Each step
 * either completes or throws one pipeline error; the contract is left in the
 * last state it reached.
 */
@Injectable()
export class ContractPipelineService {
	private readonly logger = new Logger(ContractPipelineService.name);

	constructor(
		private readonly aggregator: DataAggregatorService,
		private readonly generator: ContentGeneratorService,
		private readonly renderer: DocumentRendererService,
		private readonly gateway: SignatureGatewayService,
		private readonly contracts: RentalContractsService,
		@Inject(CONTRACTS_CONFIG) private readonly config: ContractsConfig,
	) {}

	async generateAndSubmit(
		input: GenerateContractInDto,
	): Promise<GenerateContractOutDto> {
		this.logger.log(
			`Generating contract for owner ${input.ownerId}, client ${input.clientId}, request ${input.requestId}`,
		);
		const context = await this.aggregator.aggregate({
			ownerId: input.ownerId,
			clientId: input.clientId,
			equipmentIds: input.equipmentId,
			requestId: input.requestId,
		});

		const terms = resolveContractTerms(
			{
				ownerName: input.ownerId,
				clientName: input.clientId,
				equipmentIds: input.equipmentId,
				startDate: input.startDate,
				endDate: input.endDate,
				totalValue: input.totalPrice,
			},
			context.request,
		);

		const generated = await this.generator.generate(context, terms, input.status);

		const signerEmail = input.signerEmail ?? this.config.signing.signerEmail;
		const signerName = input.signerName ?? context.client?.first_name;
		const draft = await this.contracts.createDraft({
			...terms,
			contractText: generated.markup,
			signerEmail,
			signerName,
		});

		const rendered = await this.renderer.render(generated.markup);
		await this.contracts.attachDocument(draft, rendered.digest);

		const { contract, envelopeId, signingUrl } = await this.gateway.submit({
			contract: draft,
			artifact: rendered.pdf,
			signerEmail,
			signerName,
			returnUrl: input.returnUrl ?? this.config.signing.returnUrl,
		});
		return {
			message: "Contract sent for signature",
			envelopeId,
			contractId: contract.externalId,
			signingUrl,
		};
	}

	async retrySigningUrl(
		contractId: string,
		input: SigningUrlInDto,
	): Promise<SigningUrlOutDto> {
		const contract = await this.contracts.findOneByExternalId(contractId);
		if (!contract) {
			throw new NotFoundException(`Contract ${contractId} not found`);
		}
		const { envelopeId, signingUrl } = await this.gateway.retrySigningUrl(
			contract,
			input,
		);
		return { contractId: contract.externalId, envelopeId, signingUrl };
	}
}
