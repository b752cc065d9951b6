import { Body, Controller, Logger, Param, Post } from "@nestjs/common";
import {
	ApiBadGatewayResponse,
	ApiBadRequestResponse,
	ApiBody,
	ApiConflictResponse,
	ApiCreatedResponse,
	ApiNotFoundResponse,
	ApiOperation,
	ApiServiceUnavailableResponse,
	ApiTags,
	ApiUnprocessableEntityResponse,
} from "@nestjs/swagger";

import { ContractPipelineService } from "./contract-pipeline.service";
import {
	GenerateContractInDto,
	GenerateContractOutDto,
	SigningUrlInDto,
	SigningUrlOutDto,
} from "./dto/generate-contract.dto";
import {
	ApiEnvelope,
	envelope,
	getSchemaPathForDto,
} from "../common/dto/envelopes";

@ApiTags("Rental Contracts")
@Controller("api/v1/contracts")
export class ContractPipelineController {
	private readonly logger = new Logger(ContractPipelineController.name);

	constructor(private readonly pipeline: ContractPipelineService) {}

	@Post("generate")
	@ApiOperation({
		summary: "Generate a contract and send it for signature",
	})
	@ApiBody({ type: GenerateContractInDto })
	@ApiCreatedResponse({
		description: "Contract drafted, submitted, and a signing URL issued",
		schema: getSchemaPathForDto(GenerateContractOutDto),
	})
	@ApiBadRequestResponse({ description: "Missing fields or invalid terms" })
	@ApiBadGatewayResponse({
		description: "Generation, authentication or submission failed",
	})
	@ApiUnprocessableEntityResponse({ description: "Document could not be rendered" })
	@ApiServiceUnavailableResponse({
		description: "Envelope submitted but the signing URL is unavailable",
	})
	async generate(
		@Body() dto: GenerateContractInDto,
	): Promise<ApiEnvelope<GenerateContractOutDto>> {
		const result = await this.pipeline.generateAndSubmit(dto);
		this.logger.log(
			`Contract ${result.contractId} awaiting signature in envelope ${result.envelopeId}`,
		);
		return envelope(result);
	}

	@Post(":contractId/signing-url")
	@ApiOperation({
		summary: "Request a new signing URL without re-submitting the envelope",
	})
	@ApiBody({ type: SigningUrlInDto })
	@ApiCreatedResponse({
		description: "A fresh signing URL",
		schema: getSchemaPathForDto(SigningUrlOutDto),
	})
	@ApiNotFoundResponse({ description: "Contract not found" })
	@ApiConflictResponse({
		description: "Contract not submitted yet, or already completed/declined",
	})
	@ApiServiceUnavailableResponse({ description: "Provider did not issue a URL" })
	async signingUrl(
		@Param("contractId") contractId: string,
		@Body() dto: SigningUrlInDto,
	): Promise<ApiEnvelope<SigningUrlOutDto>> {
		return envelope(await this.pipeline.retrySigningUrl(contractId, dto));
	}
}
