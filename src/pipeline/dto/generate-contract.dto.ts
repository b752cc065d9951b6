import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { Transform, TransformFnParams, Type } from "class-transformer";
import {
	ArrayNotEmpty,
	IsArray,
	IsEmail,
	IsNotEmpty,
	IsNumber,
	IsOptional,
	IsString,
	IsUrl,
	Matches,
	Min,
} from "class-validator";

// upstream services use numeric ids, this service treats them as opaque strings
const toIdString = ({ value }: TransformFnParams): unknown =>
	typeof value === "number" ? String(value) : value;

const toIdList = ({ value }: TransformFnParams): unknown => {
	if (typeof value === "string" || typeof value === "number") {
		return [String(value)];
	}
	if (Array.isArray(value)) {
		return value.map((item: unknown) =>
			typeof item === "number" ? String(item) : item,
		);
	}
	return value;
};

const DATE = /^\d{4}-\d{2}-\d{2}(T.*)?$/;

export class GenerateContractInDto {
	@ApiProperty({ example: "17", description: "Owner (renter-out) user id" })
	@Transform(toIdString)
	@IsString()
	@IsNotEmpty()
	ownerId!: string;

	@ApiProperty({ example: "23", description: "Client user id" })
	@Transform(toIdString)
	@IsString()
	@IsNotEmpty()
	clientId!: string;

	@ApiProperty({
		description: "One equipment id or a list of them",
		oneOf: [{ type: "string" }, { type: "array", items: { type: "string" } }],
		example: ["7", "9"],
	})
	@Transform(toIdList)
	@IsArray()
	@ArrayNotEmpty()
	@IsString({ each: true })
	@IsNotEmpty({ each: true })
	equipmentId!: string[];

	@ApiProperty({ example: "42", description: "Rental request id" })
	@Transform(toIdString)
	@IsString()
	@IsNotEmpty()
	requestId!: string;

	@ApiPropertyOptional({
		example: "2025-05-01",
		description: "Used when the rental request has no start date",
	})
	@IsOptional()
	@Matches(DATE, { message: "startDate must be a YYYY-MM-DD date" })
	startDate?: string;

	@ApiPropertyOptional({
		example: "2025-05-03",
		description: "Used when the rental request has no end date",
	})
	@IsOptional()
	@Matches(DATE, { message: "endDate must be a YYYY-MM-DD date" })
	endDate?: string;

	@ApiPropertyOptional({
		minimum: 0,
		example: 150,
		description: "Used when the rental request has no total price",
	})
	@IsOptional()
	@Type(() => Number)
	@IsNumber()
	@Min(0)
	totalPrice?: number;

	@ApiPropertyOptional({
		example: "active",
		description: "Request status used when the rental request has none",
	})
	@IsOptional()
	@IsString()
	status?: string;

	@ApiPropertyOptional({ example: "amal@example.com" })
	@IsOptional()
	@IsEmail()
	signerEmail?: string;

	@ApiPropertyOptional({
		example: "Amal",
		description: "Defaults to the client's first name",
	})
	@IsOptional()
	@IsString()
	@IsNotEmpty()
	signerName?: string;

	@ApiPropertyOptional({
		example: "http://localhost:5173/client/sign-status/",
		description: "Where the provider redirects after signing",
	})
	@IsOptional()
	@IsUrl({ require_tld: false })
	returnUrl?: string;
}

export class GenerateContractOutDto {
	@ApiProperty({ example: "Contract sent for signature" })
	message!: string;

	@ApiProperty({ example: "0f5b2b63-8c1d-4f0e-9a44-5d0d4a6f2c11" })
	envelopeId!: string;

	@ApiProperty({ example: "q3f7p9n4z81k6c0b" })
	contractId!: string;

	@ApiProperty({ description: "Embedded signing view for the signer" })
	signingUrl!: string;
}

export class SigningUrlInDto {
	@ApiPropertyOptional({ description: "Defaults to the signer stored on the contract" })
	@IsOptional()
	@IsEmail()
	signerEmail?: string;

	@ApiPropertyOptional({ description: "Defaults to the signer stored on the contract" })
	@IsOptional()
	@IsString()
	@IsNotEmpty()
	signerName?: string;

	@ApiPropertyOptional()
	@IsOptional()
	@IsUrl({ require_tld: false })
	returnUrl?: string;
}

export class SigningUrlOutDto {
	@ApiProperty({ example: "q3f7p9n4z81k6c0b" })
	contractId!: string;

	@ApiProperty()
	envelopeId!: string;

	@ApiProperty()
	signingUrl!: string;
}
