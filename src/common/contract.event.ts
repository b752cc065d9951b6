import type { ContractStatus } from "../contracts/contract-lifecycle";

export type ContractId = string;

export const CONTRACT_DRAFTED_ID = "contract.drafted";
export type ContractDrafted = {
	eventId: string;
	contractId: ContractId;
	ownerName: string;
	clientName: string;
	createdAt: string; // ISO timestamp
};

export const CONTRACT_SENT_FOR_SIGNING_ID = "contract.sent-for-signing";
export type ContractSentForSigning = {
	eventId: string;
	contractId: ContractId;
	envelopeId: string;
	sentForSigningAt: string;
};

export const CONTRACT_SIGNING_EVENT_ID = "contract.signing-event";
export type ContractSigningEventApplied = {
	eventId: string;
	contractId: ContractId;
	envelopeId: string;
	previousStatus: ContractStatus;
	status: ContractStatus;
	occurredAt: string;
};
