import { ApiProperty } from "@nestjs/swagger";
import { CONTRACT_STATUS, ContractStatus } from "../contract-lifecycle";

export class GetRentalContractDto {
	@ApiProperty({ example: "q3f7p9n4z81k6c0b" })
	externalId!: string;

	@ApiProperty({ description: "Owner identity reference" })
	ownerName!: string;

	@ApiProperty({ description: "Client identity reference" })
	clientName!: string;

	@ApiProperty({
		description: "Equipment ids, comma separated in request order",
		nullable: true,
		example: "12,14",
	})
	equipment!: string | null;

	@ApiProperty({ example: "2025-05-01" })
	startDate!: string;

	@ApiProperty({ example: "2025-05-04" })
	endDate!: string;

	@ApiProperty({ minimum: 0, example: 150 })
	totalValue!: number;

	@ApiProperty({
		enum: CONTRACT_STATUS,
		description: "Contract status",
		default: "draft",
	})
	status!: ContractStatus;

	@ApiProperty({ description: "Generated contract markup", nullable: true })
	contractText!: string | null;

	@ApiProperty({ description: "E-signature envelope id", nullable: true })
	envelopeId!: string | null;

	@ApiProperty({
		description: "sha256 of the PDF sent for signing",
		nullable: true,
	})
	documentDigest!: string | null;

	@ApiProperty({
		description: "Date the envelope was completed",
		nullable: true,
		example: "2025-05-02",
	})
	signedDate!: string | null;

	@ApiProperty({ description: "Unix epoch in milliseconds", nullable: true })
	sentAt!: number | null;

	@ApiProperty({ description: "Unix epoch in milliseconds", nullable: true })
	completedAt!: number | null;

	@ApiProperty({ description: "Unix epoch in milliseconds", nullable: true })
	declinedAt!: number | null;

	@ApiProperty({
		description: "Unix epoch in milliseconds",
		example: 1732690234123,
	})
	createdAt!: number;

	@ApiProperty({
		description: "Unix epoch in milliseconds",
		example: 1732690234123,
	})
	updatedAt!: number;
}
