import { Expose, plainToInstance, Type } from "class-transformer";

/*
 * Shapes of the records returned by the profile, equipment and rental-request
 * services. Every field is optional: the services are best effort and their
 * payloads are not versioned. Scalars are coerced to strings, unknown keys are
 * dropped, and an absent field renders as an empty string downstream.
 */

export class PostalAddressRecord {
	@Expose() @Type(() => String) street?: string;
	@Expose() @Type(() => String) city?: string;
	@Expose() @Type(() => String) state?: string;
	@Expose() @Type(() => String) postal_code?: string;
	@Expose() @Type(() => String) country?: string;
}

export class ProfileRecord {
	@Expose() @Type(() => String) first_name?: string;
	@Expose() @Type(() => String) last_name?: string;
	@Expose() @Type(() => String) phone?: string;
	@Expose() @Type(() => PostalAddressRecord) address?: PostalAddressRecord;
}

export class EquipmentRecord {
	@Expose() @Type(() => String) stuffname?: string;
	@Expose() @Type(() => String) brand?: string;
	@Expose() @Type(() => String) location?: string;
	@Expose() @Type(() => String) price_per_day?: string;
	/** condition of the item */
	@Expose() @Type(() => String) state?: string;
	@Expose() @Type(() => String) rental_location?: string;
	@Expose() @Type(() => String) short_description?: string;
	@Expose() @Type(() => String) detailed_description?: string;
}

export class RentalRequestRecord {
	@Expose() @Type(() => String) id?: string;
	@Expose() @Type(() => String) status?: string;
	@Expose() @Type(() => String) quantity?: string;
	@Expose() @Type(() => String) total_price?: string;
	@Expose() @Type(() => String) start_date?: string;
	@Expose() @Type(() => String) end_date?: string;
}

/** Transient union of everything fetched for one contract. */
export type AggregatedContext = {
	owner: ProfileRecord | null;
	client: ProfileRecord | null;
	/** one slot per requested equipment id, same order */
	equipment: Array<EquipmentRecord | null>;
	request: RentalRequestRecord | null;
};

type RecordClass<T> = new () => T;

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Turns an untyped JSON body into `cls`, or `null` when it is not an object. */
export function toRecord<T extends object>(
	cls: RecordClass<T>,
	body: unknown,
): T | null {
	if (!isPlainObject(body)) {
		return null;
	}
	return plainToInstance(cls, body, { excludeExtraneousValues: true });
}

/** The profile service answers with a list; its first entry is the profile. */
export function toProfileRecord(body: unknown): ProfileRecord | null {
	const candidate = Array.isArray(body) ? body[0] : body;
	const profile = toRecord(ProfileRecord, candidate);
	if (profile && isPlainObject(candidate) && !isPlainObject(candidate.address)) {
		profile.address = undefined;
	}
	return profile;
}
