import { Expose, plainToInstance, Type } from "class-transformer";
import {
	IsNotEmpty,
	IsNumber,
	IsOptional,
	IsString,
	validateSync,
} from "class-validator";

export class OAuthTokenResponse {
	@Expose() @IsString() @IsNotEmpty() access_token!: string;
	@Expose() @Type(() => Number) @IsOptional() @IsNumber() expires_in?: number;
}

export class EnvelopeSummaryResponse {
	@Expose() @IsString() @IsNotEmpty() envelopeId!: string;
	@Expose() @IsOptional() @IsString() status?: string;
}

export class RecipientViewResponse {
	@Expose() @IsString() @IsNotEmpty() url!: string;
}

export class EnvelopeStatusResponse {
	@Expose() @IsString() @IsNotEmpty() envelopeId!: string;
	@Expose() @IsString() @IsNotEmpty() status!: string;
	@Expose() @IsOptional() @IsString() statusChangedDateTime?: string;
}

/** Validates a provider response body, throwing when it lacks what we need. */
export function parseProviderResponse<T extends object>(
	cls: new () => T,
	body: unknown,
	what: string,
): T {
	if (typeof body !== "object" || body === null || Array.isArray(body)) {
		throw new Error(`${what}: response body is not an object`);
	}
	const parsed = plainToInstance(cls, body, { excludeExtraneousValues: true });
	const errors = validateSync(parsed);
	if (errors.length > 0) {
		const fields = errors.map((e) => e.property).join(", ");
		throw new Error(`${what}: invalid response (${fields})`);
	}
	return parsed;
}
