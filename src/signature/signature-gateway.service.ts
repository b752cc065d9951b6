import { ConflictException, Inject, Injectable, Logger } from "@nestjs/common";

import { ESignAuthService } from "./esign-auth.service";
import { ESignClientService, describeProviderError } from "./esign-client.service";
import {
	buildEnvelopeDefinition,
	buildRecipientViewRequest,
} from "./envelope-definition";
import { RentalContract } from "../contracts/rental-contract.entity";
import { RentalContractsService } from "../contracts/rental-contracts.service";
import { isFinalStatus } from "../contracts/contract-lifecycle";
import { CONTRACTS_CONFIG, ContractsConfig } from "../config/contracts.config";
import {
	ContractPipelineError,
	isPipelineError,
} from "../common/errors";

export type SubmissionRequest = {
	contract: RentalContract;
	artifact?: Uint8Array | null;
	signerEmail?: string | null;
	signerName?: string | null;
	returnUrl: string;
};

export type SubmissionResult = {
	contract: RentalContract;
	envelopeId: string;
	signingUrl: string;
};

export type SignerOverrides = {
	signerEmail?: string;
	signerName?: string;
	returnUrl?: string;
};

type Signer = { email: string; name: string; returnUrl: string };

const present = (value: string | null | undefined): value is string =>
	typeof value === "string" && value.trim() !== "";

/**
 * Routes a rendered contract through the e-signature provider.
 *
 * Submission is two-phase: the envelope is created on the provider, then its
 * id and the `sent_for_signing` status are committed together on the record.
 * The signing view is requested afterwards and can be retried on its own.
 */
@Injectable()
export class SignatureGatewayService {
	private readonly logger = new Logger(SignatureGatewayService.name);

	constructor(
		private readonly auth: ESignAuthService,
		private readonly client: ESignClientService,
		private readonly contracts: RentalContractsService,
		@Inject(CONTRACTS_CONFIG) private readonly config: ContractsConfig,
	) {}

	async submit(request: SubmissionRequest): Promise<SubmissionResult> {
		const { contract, artifact, signerEmail, signerName } = request;
		const missing = [
			artifact && artifact.length > 0 ? undefined : "artifact",
			present(signerEmail) ? undefined : "signerEmail",
			present(signerName) ? undefined : "signerName",
			present(contract.ownerName) ? undefined : "ownerName",
			present(contract.clientName) ? undefined : "clientName",
		].filter((m): m is string => m !== undefined);
		if (missing.length > 0 || !artifact || !present(signerEmail) || !present(signerName)) {
			throw ContractPipelineError.missingFields(missing);
		}

		// fails with AUTH_FAILED before anything is sent
		await this.auth.getAccessToken();

		let envelopeId: string;
		try {
			envelopeId = await this.client.createEnvelope(
				buildEnvelopeDefinition({
					pdf: artifact,
					signerEmail,
					signerName,
					webhookUrl: this.config.esign.webhookUrl,
				}),
			);
		} catch (err) {
			if (isPipelineError(err)) throw err;
			throw new ContractPipelineError(
				"SUBMISSION_FAILED",
				`Envelope creation failed: ${describeProviderError(err)}`,
				{ contractId: contract.externalId },
				{ cause: err },
			);
		}

		let submitted: RentalContract;
		try {
			submitted = await this.contracts.recordSubmission(contract, envelopeId);
		} catch (err) {
			// the provider holds an envelope this record does not know about
			this.logger.error(
				`Envelope ${envelopeId} was created but could not be recorded on contract ${contract.externalId}: ${describeProviderError(err)}`,
			);
			throw new ContractPipelineError(
				"SUBMISSION_FAILED",
				`Envelope ${envelopeId} could not be recorded: ${describeProviderError(err)}`,
				{ contractId: contract.externalId },
				{ cause: err },
			);
		}
		this.logger.log(
			`Contract ${submitted.externalId} sent for signing as envelope ${envelopeId}`,
		);

		const signingUrl = await this.requestSigningUrl(submitted, envelopeId, {
			email: signerEmail,
			name: signerName,
			returnUrl: request.returnUrl,
		});
		return { contract: submitted, envelopeId, signingUrl };
	}

	/** Requests a fresh signing view for an already submitted contract. */
	async retrySigningUrl(
		contract: RentalContract,
		overrides: SignerOverrides = {},
	): Promise<{ envelopeId: string; signingUrl: string }> {
		if (!contract.envelopeId) {
			throw new ConflictException(
				`Contract ${contract.externalId} has not been submitted for signing`,
			);
		}
		if (isFinalStatus(contract.status)) {
			throw new ConflictException(
				`Contract ${contract.externalId} is already ${contract.status}`,
			);
		}
		const email = overrides.signerEmail ?? contract.signerEmail;
		const name = overrides.signerName ?? contract.signerName;
		if (!present(email) || !present(name)) {
			throw ContractPipelineError.missingFields(
				[
					present(email) ? undefined : "signerEmail",
					present(name) ? undefined : "signerName",
				].filter((m): m is string => m !== undefined),
			);
		}
		const envelopeId = contract.envelopeId;
		const signingUrl = await this.requestSigningUrl(contract, envelopeId, {
			email,
			name,
			returnUrl: overrides.returnUrl ?? this.config.signing.returnUrl,
		});
		return { envelopeId, signingUrl };
	}

	private async requestSigningUrl(
		contract: RentalContract,
		envelopeId: string,
		signer: Signer,
	): Promise<string> {
		try {
			return await this.client.createRecipientView(
				envelopeId,
				buildRecipientViewRequest(signer),
			);
		} catch (err) {
			this.logger.warn(
				`Signing view for envelope ${envelopeId} unavailable: ${describeProviderError(err)}`,
			);
			throw new ContractPipelineError(
				"SIGNING_URL_UNAVAILABLE",
				`Signing URL could not be retrieved: ${describeProviderError(err)}`,
				{ envelopeId, contractId: contract.externalId },
				{ cause: err },
			);
		}
	}
}
