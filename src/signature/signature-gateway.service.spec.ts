import { Test } from "@nestjs/testing";
import { ConfigService } from "@nestjs/config";
import { ConflictException } from "@nestjs/common";

import { SignatureGatewayService } from "./signature-gateway.service";
import { ESignAuthService } from "./esign-auth.service";
import { ESignClientService } from "./esign-client.service";
import { RentalContract } from "../contracts/rental-contract.entity";
import { RentalContractsService } from "../contracts/rental-contracts.service";
import {
	CONTRACTS_CONFIG,
	loadContractsConfig,
} from "../config/contracts.config";
import { ContractPipelineError } from "../common/errors";

describe("SignatureGatewayService", () => {
	let service: SignatureGatewayService;
	const mockAuth = { getAccessToken: jest.fn() };
	const mockClient = { createEnvelope: jest.fn(), createRecipientView: jest.fn() };
	const mockContracts = { recordSubmission: jest.fn() };
	const config = loadContractsConfig(
		new ConfigService({
			ESIGN_WEBHOOK_URL: "https://rentals.test/api/v1/webhooks/esign",
			DEFAULT_RETURN_URL: "https://rentals.test/sign-status/",
		}),
	);

	const draft = (overrides: Partial<RentalContract> = {}) =>
		Object.assign(new RentalContract(), {
			id: 1,
			externalId: "c-1",
			ownerName: "Sami",
			clientName: "Amal",
			status: "draft",
			envelopeId: null,
			signerEmail: "amal@example.test",
			signerName: "Amal",
			...overrides,
		});

	const request = {
		artifact: new Uint8Array([37, 80, 68, 70]),
		signerEmail: "amal@example.test",
		signerName: "Amal",
		returnUrl: "https://rentals.test/done",
	};

	beforeEach(async () => {
		const moduleRef = await Test.createTestingModule({
			providers: [SignatureGatewayService],
		})
			.useMocker((token) => {
				if (token === ESignAuthService) return mockAuth;
				if (token === ESignClientService) return mockClient;
				if (token === RentalContractsService) return mockContracts;
				if (token === CONTRACTS_CONFIG) return config;
			})
			.compile();

		service = moduleRef.get(SignatureGatewayService);
		jest.resetAllMocks();
		mockAuth.getAccessToken.mockResolvedValue("test-token");
		mockContracts.recordSubmission.mockImplementation(
			async (contract: RentalContract, envelopeId: string) =>
				draft({ ...contract, envelopeId, status: "sent_for_signing" }),
		);
	});

	it("should submit, record and return the signing url", async () => {
		mockClient.createEnvelope.mockResolvedValue("env-1");
		mockClient.createRecipientView.mockResolvedValue("https://sign.test/view/1");

		const result = await service.submit({ contract: draft(), ...request });

		expect(result.envelopeId).toBe("env-1");
		expect(result.signingUrl).toBe("https://sign.test/view/1");
		expect(result.contract.status).toBe("sent_for_signing");

		const [definition] = mockClient.createEnvelope.mock.calls[0];
		expect(definition.documents).toEqual([
			{
				documentBase64: "JVBERg==",
				name: "Rental Contract",
				fileExtension: "pdf",
				documentId: "1",
			},
		]);
		expect(definition.recipients.signers).toHaveLength(1);
		expect(definition.eventNotification.url).toBe(
			"https://rentals.test/api/v1/webhooks/esign",
		);
		expect(mockClient.createRecipientView).toHaveBeenCalledWith("env-1", {
			returnUrl: "https://rentals.test/done",
			authenticationMethod: "none",
			email: "amal@example.test",
			userName: "Amal",
			clientUserId: "1",
			recipientId: "1",
		});
	});

	it("should reject missing fields before any network call", async () => {
		await expect(
			service.submit({
				contract: draft({ clientName: "" }),
				...request,
				artifact: new Uint8Array(),
				signerEmail: undefined,
			}),
		).rejects.toMatchObject({
			code: "MISSING_FIELDS",
			context: { missing: ["artifact", "signerEmail", "clientName"] },
		});
		expect(mockAuth.getAccessToken).not.toHaveBeenCalled();
		expect(mockClient.createEnvelope).not.toHaveBeenCalled();
	});

	it("should stop at AUTH_FAILED without creating an envelope", async () => {
		mockAuth.getAccessToken.mockRejectedValue(
			new ContractPipelineError("AUTH_FAILED", "Token exchange failed"),
		);

		await expect(service.submit({ contract: draft(), ...request })).rejects.toMatchObject({
			code: "AUTH_FAILED",
		});
		expect(mockClient.createEnvelope).not.toHaveBeenCalled();
		expect(mockContracts.recordSubmission).not.toHaveBeenCalled();
	});

	it("should leave the contract untouched when envelope creation fails", async () => {
		mockClient.createEnvelope.mockRejectedValue(new Error("socket hang up"));

		await expect(service.submit({ contract: draft(), ...request })).rejects.toMatchObject({
			code: "SUBMISSION_FAILED",
			detail: "Envelope creation failed: socket hang up",
			context: { contractId: "c-1" },
		});
		expect(mockContracts.recordSubmission).not.toHaveBeenCalled();
	});

	it("should report SIGNING_URL_UNAVAILABLE with the recorded envelope", async () => {
		mockClient.createEnvelope.mockResolvedValue("env-1");
		mockClient.createRecipientView.mockRejectedValue(new Error("timeout of 10000ms exceeded"));

		await expect(service.submit({ contract: draft(), ...request })).rejects.toMatchObject({
			code: "SIGNING_URL_UNAVAILABLE",
			context: { envelopeId: "env-1", contractId: "c-1" },
		});
		expect(mockContracts.recordSubmission).toHaveBeenCalledWith(
			expect.objectContaining({ externalId: "c-1" }),
			"env-1",
		);
	});

	describe("retrySigningUrl", () => {
		it("should use the stored signer and default return url", async () => {
			mockClient.createRecipientView.mockResolvedValue("https://sign.test/view/2");

			const result = await service.retrySigningUrl(
				draft({ envelopeId: "env-1", status: "sent" }),
			);

			expect(result).toEqual({
				envelopeId: "env-1",
				signingUrl: "https://sign.test/view/2",
			});
			expect(mockClient.createRecipientView).toHaveBeenCalledWith(
				"env-1",
				expect.objectContaining({
					email: "amal@example.test",
					userName: "Amal",
					returnUrl: "https://rentals.test/sign-status/",
				}),
			);
		});

		it("should refuse a contract that was never submitted", async () => {
			await expect(service.retrySigningUrl(draft())).rejects.toBeInstanceOf(
				ConflictException,
			);
		});

		it("should refuse a contract in a final state", async () => {
			await expect(
				service.retrySigningUrl(draft({ envelopeId: "env-1", status: "completed" })),
			).rejects.toBeInstanceOf(ConflictException);
			expect(mockClient.createRecipientView).not.toHaveBeenCalled();
		});
	});
});
