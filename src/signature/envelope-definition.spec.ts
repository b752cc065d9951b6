import { buildEnvelopeDefinition } from "./envelope-definition";

describe("buildEnvelopeDefinition", () => {
	it("should hold one document and one signer with one signature", () => {
		const definition = buildEnvelopeDefinition({
			pdf: new Uint8Array([1, 2, 3]),
			signerEmail: "amal@example.test",
			signerName: "Amal",
			webhookUrl: "https://rentals.test/hook",
		});

		expect(definition.status).toBe("sent");
		expect(definition.emailSubject).toBe("Please Sign the Rental Contract");
		expect(definition.documents).toHaveLength(1);
		expect(definition.documents[0].documentBase64).toBe("AQID");
		expect(definition.recipients.signers).toEqual([
			{
				email: "amal@example.test",
				name: "Amal",
				recipientId: "1",
				routingOrder: "1",
				clientUserId: "1",
				tabs: {
					signHereTabs: [
						{ documentId: "1", pageNumber: "1", xPosition: "100", yPosition: "150" },
					],
				},
			},
		]);
	});

	it("should subscribe to sent, completed and declined events", () => {
		const definition = buildEnvelopeDefinition({
			pdf: new Uint8Array([1]),
			signerEmail: "amal@example.test",
			signerName: "Amal",
			webhookUrl: "https://rentals.test/hook",
		});

		expect(definition.eventNotification.url).toBe("https://rentals.test/hook");
		expect(
			definition.eventNotification.envelopeEvents.map((e) => e.envelopeEventStatusCode),
		).toEqual(["sent", "completed", "declined"]);
	});
});
