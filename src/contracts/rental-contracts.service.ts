import {
	Injectable,
	InternalServerErrorException,
	Logger,
	NotFoundException,
} from "@nestjs/common";
import { InjectRepository } from "@nestjs/typeorm";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { Brackets, In, IsNull, Repository } from "typeorm";
import { nanoid } from "nanoid";

import { RentalContract } from "./rental-contract.entity";
import {
	ContractStatus,
	decideSigningTransition,
	NoopReason,
	nextStatus,
	SigningEvent,
	SigningTimestampField,
} from "./contract-lifecycle";
import { GetRentalContractDto } from "./dto/get-rental-contract.dto";
import {
	CONTRACT_DRAFTED_ID,
	CONTRACT_SENT_FOR_SIGNING_ID,
	CONTRACT_SIGNING_EVENT_ID,
	ContractDrafted,
	ContractSentForSigning,
	ContractSigningEventApplied,
} from "../common/contract.event";
import {
	Cursor,
	cursorToString,
	emptyCursor,
} from "../common/dto/envelopes";
import { ContractPipelineError } from "../common/errors";
import { checkTermsInvariants } from "../generation/contract-terms";

// optimistic writes retried this many times before giving up
const MAX_WRITE_ATTEMPTS = 5;

export type DraftContractInput = {
	ownerName: string;
	clientName: string;
	equipment: string | null;
	startDate: string;
	endDate: string;
	totalValue: number;
	contractText: string;
	signerEmail?: string;
	signerName?: string;
};

export type ContractQueryFilter = {
	ownerName?: string;
	clientName?: string;
	status?: ContractStatus;
};

export type SigningEventOutcome =
	| {
			outcome: "applied";
			contractId: string;
			previousStatus: ContractStatus;
			status: ContractStatus;
	  }
	| {
			outcome: "ignored";
			contractId: string;
			status: ContractStatus;
			reason: NoopReason;
	  };

type SigningUpdate = Pick<RentalContract, "status"> &
	Partial<Pick<RentalContract, SigningTimestampField>>;

function signingUpdate(
	status: ContractStatus,
	field: SigningTimestampField,
	at: Date,
): SigningUpdate {
	switch (field) {
		case "sentAt":
			return { status, sentAt: at };
		case "completedAt":
			return { status, completedAt: at };
		case "declinedAt":
			return { status, declinedAt: at };
	}
}

const toEpoch = (date: Date | null) => (date ? date.getTime() : null);

@Injectable()
export class RentalContractsService {
	private readonly logger = new Logger(RentalContractsService.name);

	constructor(
		@InjectRepository(RentalContract)
		private readonly contractRepository: Repository<RentalContract>,
		private readonly events: EventEmitter2,
	) {}

	async createDraft(input: DraftContractInput): Promise<RentalContract> {
		const violation = checkTermsInvariants(input);
		if (violation) {
			throw new ContractPipelineError("INVALID_TERMS", violation);
		}
		const entity = this.contractRepository.create({
			externalId: nanoid(16),
			ownerName: input.ownerName,
			clientName: input.clientName,
			equipment: input.equipment,
			startDate: input.startDate,
			endDate: input.endDate,
			totalValue: input.totalValue,
			contractText: input.contractText,
			signerEmail: input.signerEmail ?? null,
			signerName: input.signerName ?? null,
			status: "draft",
			envelopeId: null,
		});
		const persisted = await this.contractRepository.save(entity);
		this.logger.log(
			`Drafted contract ${persisted.externalId} between ${persisted.ownerName} and ${persisted.clientName}`,
		);
		this.events.emit(CONTRACT_DRAFTED_ID, {
			eventId: nanoid(4),
			contractId: persisted.externalId,
			ownerName: persisted.ownerName,
			clientName: persisted.clientName,
			createdAt: persisted.createdAt.toISOString(),
		} satisfies ContractDrafted);
		return persisted;
	}

	async attachDocument(contract: RentalContract, digest: string) {
		await this.contractRepository.update(
			{ id: contract.id },
			{ documentDigest: digest },
		);
		contract.documentDigest = digest;
	}

	/**
	 * Commit point of a submission: stores the envelope id and advances the
	 * status in one conditional statement, so readers see both or neither and
	 * an envelope id can never be overwritten.
	 */
	async recordSubmission(
		contract: RentalContract,
		envelopeId: string,
	): Promise<RentalContract> {
		const status = nextStatus("draft", "submit");
		if (status === undefined) {
			throw new Error("Lifecycle does not allow submitting a draft");
		}
		const result = await this.contractRepository.update(
			{ id: contract.id, status: "draft", envelopeId: IsNull() },
			{ envelopeId, status },
		);
		if (result.affected !== 1) {
			throw new Error(
				`Contract ${contract.externalId} is not a draft awaiting submission`,
			);
		}
		this.events.emit(CONTRACT_SENT_FOR_SIGNING_ID, {
			eventId: nanoid(4),
			contractId: contract.externalId,
			envelopeId,
			sentForSigningAt: new Date().toISOString(),
		} satisfies ContractSentForSigning);

		const persisted = await this.contractRepository.findOne({
			where: { id: contract.id },
		});
		if (!persisted) {
			throw new InternalServerErrorException("Contract not found after update");
		}
		return persisted;
	}

	findByEnvelopeId(envelopeId: string): Promise<RentalContract | null> {
		return this.contractRepository.findOne({ where: { envelopeId } });
	}

	findOneByExternalId(externalId: string): Promise<RentalContract | null> {
		return this.contractRepository.findOne({ where: { externalId } });
	}

	/** Contracts the provider has not reported a final status for yet. */
	findAwaitingSignature(limit: number): Promise<RentalContract[]> {
		return this.contractRepository.find({
			where: { status: In(["sent_for_signing", "sent"]) },
			order: { updatedAt: "ASC" },
			take: limit,
		});
	}

	/**
	 * The only way a signing event mutates a contract, whatever delivered it.
	 * Writes are guarded by the row version: a lost race re-reads the row and
	 * decides again, so a stale read can never resurrect an overturned status.
	 */
	async applySigningEvent(
		contract: RentalContract,
		event: SigningEvent,
	): Promise<SigningEventOutcome> {
		let current = contract;
		for (let attempt = 1; attempt <= MAX_WRITE_ATTEMPTS; attempt++) {
			const decision = decideSigningTransition(current, event);
			if (decision.type === "noop") {
				this.logger.debug(
					`Contract ${current.externalId}: ${event.status} ignored (${decision.reason})`,
				);
				return {
					outcome: "ignored",
					contractId: current.externalId,
					status: current.status,
					reason: decision.reason,
				};
			}

			const result = await this.contractRepository.update(
				{ id: current.id, version: current.version },
				signingUpdate(decision.to, decision.timestampField, event.occurredAt),
			);
			if (result.affected === 1) {
				this.logger.log(
					`Contract ${current.externalId}: ${decision.from} -> ${decision.to}`,
				);
				this.events.emit(CONTRACT_SIGNING_EVENT_ID, {
					eventId: nanoid(4),
					contractId: current.externalId,
					envelopeId: event.envelopeId,
					previousStatus: decision.from,
					status: decision.to,
					occurredAt: event.occurredAt.toISOString(),
				} satisfies ContractSigningEventApplied);
				return {
					outcome: "applied",
					contractId: current.externalId,
					previousStatus: decision.from,
					status: decision.to,
				};
			}

			this.logger.debug(
				`Contract ${current.externalId} changed concurrently (attempt ${attempt})`,
			);
			const fresh = await this.contractRepository.findOne({
				where: { id: current.id },
			});
			if (!fresh) {
				throw new Error(`Contract ${current.externalId} disappeared`);
			}
			current = fresh;
		}
		throw new Error(
			`Contract ${contract.externalId} still contended after ${MAX_WRITE_ATTEMPTS} attempts`,
		);
	}

	async getOneByExternalId(externalId: string): Promise<GetRentalContractDto> {
		const contract = await this.findOneByExternalId(externalId);
		if (!contract) {
			throw new NotFoundException(`Contract ${externalId} not found`);
		}
		return RentalContractsService.toDto(contract);
	}

	async list(
		filter: ContractQueryFilter,
		limit: number,
		cursor: Cursor = emptyCursor,
	): Promise<{
		items: GetRentalContractDto[];
		nextCursor?: string;
		total: number;
	}> {
		const take = Math.max(1, Math.min(limit, 100));

		const filtered = new Brackets((w) => {
			w.where("1 = 1");
			if (filter.ownerName) {
				w.andWhere("c.ownerName = :ownerName", { ownerName: filter.ownerName });
			}
			if (filter.clientName) {
				w.andWhere("c.clientName = :clientName", {
					clientName: filter.clientName,
				});
			}
			if (filter.status) {
				w.andWhere("c.status = :status", { status: filter.status });
			}
		});

		const qb = this.contractRepository.createQueryBuilder("c").where(filtered);
		if (cursor.createdBefore !== undefined && cursor.idBefore !== undefined) {
			qb.andWhere(
				new Brackets((w) => {
					w.where("c.createdAt < :createdBefore", {
						createdBefore: cursor.createdBefore,
					}).orWhere(
						new Brackets((w2) => {
							w2.where("c.createdAt = :createdAtEq", {
								createdAtEq: cursor.createdBefore,
							}).andWhere("c.id < :idBefore", { idBefore: cursor.idBefore });
						}),
					);
				}),
			);
		}

		const rows = await qb
			.orderBy("c.createdAt", "DESC")
			.addOrderBy("c.id", "DESC")
			.take(take)
			.getMany();

		const total = await this.contractRepository
			.createQueryBuilder("c")
			.where(filtered)
			.getCount();

		const last = rows.at(-1);
		const nextCursor =
			rows.length === take && last
				? cursorToString(last.createdAt, last.id)
				: undefined;

		return {
			items: rows.map((row) => RentalContractsService.toDto(row)),
			nextCursor,
			total,
		};
	}

	static toDto(contract: RentalContract): GetRentalContractDto {
		return {
			externalId: contract.externalId,
			ownerName: contract.ownerName,
			clientName: contract.clientName,
			equipment: contract.equipment,
			startDate: contract.startDate,
			endDate: contract.endDate,
			totalValue: contract.totalValue,
			status: contract.status,
			contractText: contract.contractText,
			envelopeId: contract.envelopeId,
			documentDigest: contract.documentDigest,
			signedDate: contract.completedAt
				? contract.completedAt.toISOString().slice(0, 10)
				: null,
			sentAt: toEpoch(contract.sentAt),
			completedAt: toEpoch(contract.completedAt),
			declinedAt: toEpoch(contract.declinedAt),
			createdAt: contract.createdAt.getTime(),
			updatedAt: contract.updatedAt.getTime(),
		};
	}
}
