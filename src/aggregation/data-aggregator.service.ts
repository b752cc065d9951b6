import { Inject, Injectable, Logger } from "@nestjs/common";
import type { AxiosInstance } from "axios";

import { EXTERNAL_HTTP } from "./aggregation.constants";
import {
	AggregatedContext,
	EquipmentRecord,
	ProfileRecord,
	RentalRequestRecord,
	toProfileRecord,
	toRecord,
} from "./external-records";
import { CONTRACTS_CONFIG, ContractsConfig } from "../config/contracts.config";
import { describeFailure } from "../common/errors";

export type AggregationRequest = {
	ownerId: string;
	clientId: string;
	equipmentIds: string[];
	requestId?: string;
};

export type ExternalHttp = Pick<AxiosInstance, "get">;

function joinPath(base: string, id: string): string {
	const prefix = base.endsWith("/") ? base : `${base}/`;
	return `${prefix}${encodeURIComponent(id)}/`;
}

/**
 * Collects everything the contract document is built from. Each record is
 * fetched once with its own timeout; a failed fetch leaves that slot `null`
 * and never fails the aggregation.
 */
@Injectable()
export class DataAggregatorService {
	private readonly logger = new Logger(DataAggregatorService.name);

	constructor(
		@Inject(EXTERNAL_HTTP) private readonly http: ExternalHttp,
		@Inject(CONTRACTS_CONFIG) private readonly config: ContractsConfig,
	) {}

	async aggregate(input: AggregationRequest): Promise<AggregatedContext> {
		const [owner, client, equipment, request] = await Promise.all([
			this.fetchProfile(input.ownerId),
			this.fetchProfile(input.clientId),
			Promise.all(input.equipmentIds.map((id) => this.fetchEquipment(id))),
			input.requestId
				? this.fetchRentalRequest(input.requestId)
				: Promise.resolve(null),
		]);
		const missing = [
			owner ? undefined : "owner",
			client ? undefined : "client",
			...equipment.map((e, i) => (e ? undefined : `equipment[${i}]`)),
			request ? undefined : "request",
		].filter((m): m is string => m !== undefined);
		if (missing.length > 0) {
			this.logger.warn(`Aggregated with missing records: ${missing.join(", ")}`);
		}
		return { owner, client, equipment, request };
	}

	fetchProfile(userId: string): Promise<ProfileRecord | null> {
		return this.fetchRecord(`profile ${userId}`, toProfileRecord, () =>
			this.http.get<unknown>(this.config.services.profileUrl, {
				params: { user: userId },
				timeout: this.config.services.timeoutMs,
			}),
		);
	}

	fetchEquipment(equipmentId: string): Promise<EquipmentRecord | null> {
		return this.fetchRecord(
			`equipment ${equipmentId}`,
			(body) => toRecord(EquipmentRecord, body),
			() =>
				this.http.get<unknown>(
					joinPath(this.config.services.equipmentUrl, equipmentId),
					{ timeout: this.config.services.timeoutMs },
				),
		);
	}

	fetchRentalRequest(requestId: string): Promise<RentalRequestRecord | null> {
		return this.fetchRecord(
			`rental request ${requestId}`,
			(body) => toRecord(RentalRequestRecord, body),
			() =>
				this.http.get<unknown>(
					joinPath(this.config.services.rentalRequestUrl, requestId),
					{ timeout: this.config.services.timeoutMs },
				),
		);
	}

	private async fetchRecord<T>(
		label: string,
		parse: (body: unknown) => T | null,
		get: () => Promise<{ data: unknown }>,
	): Promise<T | null> {
		try {
			const { data } = await get();
			const record = parse(data);
			if (record === null) {
				this.logger.warn(`FetchFailed: ${label} returned an unusable body`);
			}
			return record;
		} catch (err) {
			this.logger.error(`FetchFailed: ${label}: ${describeFailure(err)}`);
			return null;
		}
	}
}
