import { SIGNING_EVENT_STATUS } from "../contracts/contract-lifecycle";

// identifiers the single-document, single-signer envelope is built with
export const DOCUMENT_ID = "1";
export const RECIPIENT_ID = "1";
export const CLIENT_USER_ID = "1";

export type EnvelopeDocument = {
	documentBase64: string;
	name: string;
	fileExtension: "pdf";
	documentId: string;
};

export type SignHereTab = {
	documentId: string;
	pageNumber: string;
	xPosition: string;
	yPosition: string;
};

export type EnvelopeSigner = {
	email: string;
	name: string;
	recipientId: string;
	routingOrder: string;
	clientUserId: string;
	tabs: { signHereTabs: SignHereTab[] };
};

export type EventNotification = {
	url: string;
	loggingEnabled: "true";
	requireAcknowledgment: "true";
	envelopeEvents: Array<{ envelopeEventStatusCode: string }>;
};

export type EnvelopeDefinition = {
	emailSubject: string;
	documents: EnvelopeDocument[];
	recipients: { signers: EnvelopeSigner[] };
	eventNotification: EventNotification;
	status: "sent";
};

export type RecipientViewRequest = {
	returnUrl: string;
	authenticationMethod: "none";
	email: string;
	userName: string;
	clientUserId: string;
	recipientId: string;
};

export type EnvelopeInput = {
	pdf: Uint8Array;
	signerEmail: string;
	signerName: string;
	webhookUrl: string;
	documentName?: string;
};

/**
 * Exactly one document and one signer with one signature placement on the
 * first page. The provider notifies `webhookUrl` of every signing event the
 * lifecycle models.
 */
export function buildEnvelopeDefinition(input: EnvelopeInput): EnvelopeDefinition {
	return {
		emailSubject: "Please Sign the Rental Contract",
		documents: [
			{
				documentBase64: Buffer.from(input.pdf).toString("base64"),
				name: input.documentName ?? "Rental Contract",
				fileExtension: "pdf",
				documentId: DOCUMENT_ID,
			},
		],
		recipients: {
			signers: [
				{
					email: input.signerEmail,
					name: input.signerName,
					recipientId: RECIPIENT_ID,
					routingOrder: "1",
					clientUserId: CLIENT_USER_ID,
					tabs: {
						signHereTabs: [
							{
								documentId: DOCUMENT_ID,
								pageNumber: "1",
								xPosition: "100",
								yPosition: "150",
							},
						],
					},
				},
			],
		},
		eventNotification: {
			url: input.webhookUrl,
			loggingEnabled: "true",
			requireAcknowledgment: "true",
			envelopeEvents: SIGNING_EVENT_STATUS.map((status) => ({
				envelopeEventStatusCode: status,
			})),
		},
		status: "sent",
	};
}

export function buildRecipientViewRequest(signer: {
	email: string;
	name: string;
	returnUrl: string;
}): RecipientViewRequest {
	return {
		returnUrl: signer.returnUrl,
		authenticationMethod: "none",
		email: signer.email,
		userName: signer.name,
		clientUserId: CLIENT_USER_ID,
		recipientId: RECIPIENT_ID,
	};
}
