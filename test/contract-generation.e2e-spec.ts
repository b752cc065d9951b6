import type { INestApplication } from "@nestjs/common";
import request from "supertest";

import {
	ENVELOPES_URL,
	FakeHttp,
	createTestApp,
	generateBody,
	generateContract,
	stubRentalRecords,
} from "./utils";

describe("Contract generation (e2e)", () => {
	let app: INestApplication;
	let services: FakeHttp;
	let esign: FakeHttp;
	let textGeneration: { generate: jest.Mock };

	beforeEach(async () => {
		({ app, services, esign, textGeneration } = await createTestApp());
		stubRentalRecords(services);
	});

	afterEach(async () => {
		await app.close();
	});

	it("should send a contract for signature even when the owner profile is unavailable", async () => {
		const res = await generateContract(app).expect(201);

		expect(res.body.data).toEqual({
			message: "Contract sent for signature",
			envelopeId: "env-1",
			contractId: expect.any(String),
			signingUrl: "https://sign.test/env-1",
		});

		const [prompt] = textGeneration.generate.mock.calls[0];
		expect(prompt).toContain("- Owner Name: 7");
		expect(prompt).toContain("- Total Value: 150.00 TND");
		expect(prompt).toContain("- Name: Drill");

		const contract = await request(app.getHttpServer())
			.get(`/api/v1/contracts/${res.body.data.contractId}`)
			.expect(200);
		expect(contract.body.data).toMatchObject({
			ownerName: "7",
			clientName: "9",
			equipment: "12",
			startDate: "2025-05-01",
			endDate: "2025-05-04",
			totalValue: 150,
			status: "sent_for_signing",
			envelopeId: "env-1",
			signedDate: null,
		});
		expect(contract.body.data.documentDigest).toMatch(/^[0-9a-f]{64}$/);
	});

	it("should address the envelope to the client with the default signer email", async () => {
		await generateContract(app).expect(201);

		const call = esign.post.mock.calls.find(([url]) => url === ENVELOPES_URL);
		expect(call?.[2]).toMatchObject({
			headers: { Authorization: "Bearer test-token" },
		});
		expect(call?.[1]).toMatchObject({
			documents: [expect.objectContaining({ fileExtension: "pdf" })],
			recipients: {
				signers: [
					expect.objectContaining({
						email: "client@example.test",
						name: "Amal",
					}),
				],
			},
		});
	});

	it("should report the envelope id when no signing URL can be issued", async () => {
		esign.routes.delete(`${ENVELOPES_URL}/env-1/views/recipient`);

		const res = await generateContract(app).expect(503);

		expect(res.body).toMatchObject({
			code: "SIGNING_URL_UNAVAILABLE",
			envelopeId: "env-1",
		});

		const list = await request(app.getHttpServer())
			.get("/api/v1/contracts")
			.query({ status: "sent_for_signing" })
			.expect(200);
		expect(list.body.data).toHaveLength(1);
		expect(list.body.data[0].envelopeId).toBe("env-1");
	});

	it("should issue a fresh signing URL for a submitted contract", async () => {
		esign.routes.delete(`${ENVELOPES_URL}/env-1/views/recipient`);
		const failed = await generateContract(app).expect(503);
		esign.on(`${ENVELOPES_URL}/env-1/views/recipient`, {
			url: "https://sign.test/env-1/retry",
		});

		const res = await request(app.getHttpServer())
			.post(`/api/v1/contracts/${failed.body.contractId}/signing-url`)
			.send({})
			.expect(201);

		expect(res.body.data).toEqual({
			contractId: failed.body.contractId,
			envelopeId: "env-1",
			signingUrl: "https://sign.test/env-1/retry",
		});
	});

	it("should reject a request without equipment", async () => {
		await generateContract(app, { ...generateBody, equipmentId: [] }).expect(
			400,
		);
		expect(textGeneration.generate).not.toHaveBeenCalled();
	});

	it("should fail with missing fields when no dates can be resolved", async () => {
		services.routes.delete("http://rentals.test/rental/rental_requests/42/");

		const res = await generateContract(app).expect(400);

		expect(res.body).toMatchObject({
			code: "MISSING_FIELDS",
			missing: ["startDate", "endDate"],
		});
		expect(esign.post).not.toHaveBeenCalled();
	});

	it("should fail without creating an envelope when text generation fails", async () => {
		textGeneration.generate.mockRejectedValue(new Error("overloaded"));

		const res = await generateContract(app).expect(502);

		expect(res.body.code).toBe("GENERATION_FAILED");
		expect(esign.post).not.toHaveBeenCalled();
	});
});
