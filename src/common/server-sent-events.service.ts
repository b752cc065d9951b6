import { Injectable } from "@nestjs/common";
import { OnEvent } from "@nestjs/event-emitter";
import { filter, Subject } from "rxjs";
import {
	CONTRACT_DRAFTED_ID,
	CONTRACT_SENT_FOR_SIGNING_ID,
	CONTRACT_SIGNING_EVENT_ID,
	type ContractDrafted,
	type ContractSentForSigning,
	type ContractSigningEventApplied,
} from "./contract.event";
import type { ContractStatus } from "../contracts/contract-lifecycle";

export type ContractSse =
	| { type: "new_contract"; externalId: string }
	| { type: "contract_updated"; externalId: string; status: ContractStatus };

export type SseEvent<T = ContractSse> = {
	data: T;
};

@Injectable()
export class ServerSentEventsService {
	private readonly events$ = new Subject<ContractSse>();

	contractEvents(id?: string) {
		if (id) {
			return this.events$.pipe(filter((e) => e.externalId === id));
		}
		return this.events$.asObservable();
	}

	@OnEvent(CONTRACT_DRAFTED_ID)
	onContractDrafted(evt: ContractDrafted) {
		this.events$.next({ type: "new_contract", externalId: evt.contractId });
	}

	@OnEvent(CONTRACT_SENT_FOR_SIGNING_ID)
	onContractSentForSigning(evt: ContractSentForSigning) {
		this.events$.next({
			type: "contract_updated",
			externalId: evt.contractId,
			status: "sent_for_signing",
		});
	}

	@OnEvent(CONTRACT_SIGNING_EVENT_ID)
	onSigningEvent(evt: ContractSigningEventApplied) {
		this.events$.next({
			type: "contract_updated",
			externalId: evt.contractId,
			status: evt.status,
		});
	}
}
