import { Injectable, Logger } from "@nestjs/common";

import type { SigningEvent, ContractStatus } from "../contracts/contract-lifecycle";
import { RentalContractsService } from "../contracts/rental-contracts.service";
import { describeFailure } from "../common/errors";

export type SigningEventSource = "webhook" | "poller";

export type ReconcileOutcome =
	| {
			outcome: "applied";
			envelopeId: string;
			contractId: string;
			previousStatus: ContractStatus;
			status: ContractStatus;
	  }
	| {
			outcome: "duplicate" | "terminal" | "unrecognized-status" | "not-submitted";
			envelopeId: string;
			contractId: string;
			status: ContractStatus;
	  }
	| {
			// resolved, but the write failed; acknowledged all the same
			outcome: "failed";
			envelopeId: string;
			contractId: string;
			reason: string;
	  }
	| { outcome: "unknown-envelope"; envelopeId: string };

const OUTCOME_BY_NOOP = {
	final: "terminal",
	duplicate: "duplicate",
	"unrecognized-status": "unrecognized-status",
	"not-submitted": "not-submitted",
} as const;

/**
 * Single entry point through which provider signing events reach a contract,
 * whether they arrive by webhook or are observed by the envelope poller.
 */
@Injectable()
export class WebhookReconcilerService {
	private readonly logger = new Logger(WebhookReconcilerService.name);
	private readonly unrecognized = new Map<string, number>();

	constructor(private readonly contracts: RentalContractsService) {}

	/**
	 * Failing to look the envelope up is the only error that propagates: the
	 * event has not been resolved yet and the provider should deliver it again.
	 */
	async reconcile(
		event: SigningEvent,
		source: SigningEventSource = "webhook",
	): Promise<ReconcileOutcome> {
		const contract = await this.contracts.findByEnvelopeId(event.envelopeId);
		if (!contract) {
			this.logger.warn(
				`WebhookUnknownEnvelope: no contract for envelope ${event.envelopeId} (${source})`,
			);
			return { outcome: "unknown-envelope", envelopeId: event.envelopeId };
		}

		if (event.kind === "unrecognized") {
			const token = event.status.trim().toLowerCase();
			this.unrecognized.set(token, (this.unrecognized.get(token) ?? 0) + 1);
			this.logger.warn(
				`WebhookUnknownStatus: "${event.status}" for envelope ${event.envelopeId} ignored (${source})`,
			);
		}

		try {
			const result = await this.contracts.applySigningEvent(contract, event);
			if (result.outcome === "applied") {
				return { ...result, envelopeId: event.envelopeId };
			}
			return {
				outcome: OUTCOME_BY_NOOP[result.reason],
				envelopeId: event.envelopeId,
				contractId: result.contractId,
				status: result.status,
			};
		} catch (err) {
			const reason = describeFailure(err);
			this.logger.error(
				`Signing event "${event.status}" for envelope ${event.envelopeId} not applied: ${reason}`,
			);
			return {
				outcome: "failed",
				envelopeId: event.envelopeId,
				contractId: contract.externalId,
				reason,
			};
		}
	}

	/** Occurrences of each status token the lifecycle does not model. */
	unrecognizedStatusCounts(): Record<string, number> {
		return Object.fromEntries(this.unrecognized);
	}
}
