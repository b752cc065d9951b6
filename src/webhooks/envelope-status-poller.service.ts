import {
	Inject,
	Injectable,
	Logger,
	OnModuleDestroy,
	OnModuleInit,
} from "@nestjs/common";

import { parseEventTime } from "./envelope-event";
import { ReconcileOutcome, WebhookReconcilerService } from "./webhook-reconciler.service";
import { ESignClientService } from "../signature/esign-client.service";
import { RentalContractsService } from "../contracts/rental-contracts.service";
import { toSigningEventKind } from "../contracts/contract-lifecycle";
import { CONTRACTS_CONFIG, ContractsConfig } from "../config/contracts.config";
import { describeFailure } from "../common/errors";

const MAX_BACKOFF_MS = 15 * 60_000;

/**
 * Periodically asks the provider for the status of envelopes still awaiting a
 * final outcome and feeds what it sees through the webhook reconciler. Covers
 * lost notifications and envelopes whose notifications arrived before the
 * submission was recorded.
 */
@Injectable()
export class EnvelopeStatusPoller implements OnModuleInit, OnModuleDestroy {
	private readonly logger = new Logger(EnvelopeStatusPoller.name);
	private timer: NodeJS.Timeout | null = null;
	private running = false;
	private failures = 0;
	private nextRunAt = 0;

	constructor(
		private readonly contracts: RentalContractsService,
		private readonly client: ESignClientService,
		private readonly reconciler: WebhookReconcilerService,
		@Inject(CONTRACTS_CONFIG) private readonly config: ContractsConfig,
	) {}

	onModuleInit() {
		const { intervalMs } = this.config.poller;
		if (intervalMs <= 0) {
			this.logger.log("Envelope status poller disabled");
			return;
		}
		this.logger.log(`Starting envelope status poller every ${intervalMs}ms`);
		this.timer = setInterval(() => {
			this.tick().catch((err) =>
				this.logger.error(`Poller tick crashed: ${describeFailure(err)}`),
			);
		}, intervalMs);
	}

	onModuleDestroy() {
		if (this.timer) {
			clearInterval(this.timer);
			this.timer = null;
			this.logger.log("Stopped envelope status poller");
		}
	}

	private async tick() {
		if (this.running || Date.now() < this.nextRunAt) return;
		this.running = true;
		try {
			await this.pollOnce();
			this.failures = 0;
			this.nextRunAt = 0;
		} catch (err) {
			this.failures++;
			const backoff = Math.min(
				this.config.poller.intervalMs * 2 ** this.failures,
				MAX_BACKOFF_MS,
			);
			this.nextRunAt = Date.now() + backoff;
			this.logger.error(
				`Envelope poll failed (${this.failures} in a row), next attempt in ${backoff}ms: ${describeFailure(err)}`,
			);
		} finally {
			this.running = false;
		}
	}

	/**
	 * One pass over the contracts awaiting signature. A provider error for one
	 * envelope is logged and skipped; failing to list contracts fails the pass.
	 */
	async pollOnce(): Promise<ReconcileOutcome[]> {
		const pending = await this.contracts.findAwaitingSignature(
			this.config.poller.batchSize,
		);
		const outcomes: ReconcileOutcome[] = [];
		for (const contract of pending) {
			if (!contract.envelopeId) continue;
			try {
				const envelope = await this.client.getEnvelopeStatus(contract.envelopeId);
				outcomes.push(
					await this.reconciler.reconcile(
						{
							envelopeId: contract.envelopeId,
							kind: toSigningEventKind(envelope.status),
							status: envelope.status,
							occurredAt: parseEventTime(envelope.statusChangedDateTime, new Date()),
						},
						"poller",
					),
				);
			} catch (err) {
				this.logger.warn(
					`Could not poll envelope ${contract.envelopeId}: ${describeFailure(err)}`,
				);
			}
		}
		return outcomes;
	}
}
