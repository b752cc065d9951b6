import type { RentalRequestRecord } from "../aggregation/external-records";
import { ContractPipelineError } from "../common/errors";

export type ContractTermsInput = {
	ownerName: string;
	clientName: string;
	equipmentIds: string[];
	startDate?: string;
	endDate?: string;
	totalValue?: number;
};

export type ResolvedContractTerms = {
	ownerName: string;
	clientName: string;
	/** equipment ids joined in request order */
	equipment: string | null;
	startDate: string;
	endDate: string;
	totalValue: number;
};

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/** `2025-05-01T09:30:00Z` -> `2025-05-01` */
export function toDateOnly(value: string): string {
	return value.split("T")[0].trim();
}

function pickDate(
	fromRequest: string | undefined,
	fromTerms: string | undefined,
): string | undefined {
	const value = fromRequest?.trim() ? fromRequest : fromTerms;
	return value?.trim() ? toDateOnly(value) : undefined;
}

function pickTotal(
	fromRequest: string | undefined,
	fromTerms: number | undefined,
): number {
	if (fromRequest !== undefined && fromRequest !== null && fromRequest.trim() !== "") {
		return Number(fromRequest);
	}
	return fromTerms ?? 0;
}

function isCalendarDate(value: string): boolean {
	if (!ISO_DATE.test(value)) return false;
	const parsed = new Date(`${value}T00:00:00Z`);
	return (
		!Number.isNaN(parsed.getTime()) &&
		parsed.toISOString().slice(0, 10) === value
	);
}

/** Returns a description of the first broken invariant, if any. */
export function checkTermsInvariants(terms: {
	startDate: string;
	endDate: string;
	totalValue: number;
}): string | undefined {
	if (!isCalendarDate(terms.startDate)) {
		return `startDate "${terms.startDate}" is not a YYYY-MM-DD date`;
	}
	if (!isCalendarDate(terms.endDate)) {
		return `endDate "${terms.endDate}" is not a YYYY-MM-DD date`;
	}
	if (terms.startDate > terms.endDate) {
		return `startDate ${terms.startDate} is after endDate ${terms.endDate}`;
	}
	if (!Number.isFinite(terms.totalValue) || terms.totalValue < 0) {
		return `totalValue must be a non-negative amount, got ${terms.totalValue}`;
	}
	return undefined;
}

/**
 * Merges caller supplied terms with the rental request. Request dates and
 * totals win when both are present.
 */
export function resolveContractTerms(
	input: ContractTermsInput,
	request: RentalRequestRecord | null,
): ResolvedContractTerms {
	const startDate = pickDate(request?.start_date, input.startDate);
	const endDate = pickDate(request?.end_date, input.endDate);
	const missing = [
		startDate ? undefined : "startDate",
		endDate ? undefined : "endDate",
	].filter((m): m is string => m !== undefined);
	if (startDate === undefined || endDate === undefined) {
		throw ContractPipelineError.missingFields(missing);
	}

	const terms: ResolvedContractTerms = {
		ownerName: input.ownerName,
		clientName: input.clientName,
		equipment: input.equipmentIds.length > 0 ? input.equipmentIds.join(",") : null,
		startDate,
		endDate,
		totalValue: pickTotal(request?.total_price, input.totalValue),
	};
	const violation = checkTermsInvariants(terms);
	if (violation) {
		throw new ContractPipelineError("INVALID_TERMS", violation);
	}
	return terms;
}
