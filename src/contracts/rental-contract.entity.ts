import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
	UpdateDateColumn,
	VersionColumn,
} from "typeorm";
import { CONTRACT_STATUS, ContractStatus } from "./contract-lifecycle";

const decimalToNumber = {
	to: (value: number) => value,
	from: (value: string | number | null) =>
		value === null ? 0 : Number(value),
};

@Entity("rental_contracts")
export class RentalContract {
	@PrimaryGeneratedColumn()
	id!: number;

	@Index({ unique: true })
	@Column({ type: "text" })
	externalId!: string;

	@Index()
	@Column({ type: "text" })
	ownerName!: string;

	@Index()
	@Column({ type: "text" })
	clientName!: string;

	// comma separated equipment ids, input order
	@Column({ type: "text", nullable: true })
	equipment!: string | null;

	// YYYY-MM-DD
	@Column({ type: "text" })
	startDate!: string;

	@Column({ type: "text" })
	endDate!: string;

	@Column({
		type: "decimal",
		precision: 10,
		scale: 2,
		transformer: decimalToNumber,
	})
	totalValue!: number;

	@Column({ type: "text", nullable: true })
	contractText!: string | null;

	// sha256 of the rendered PDF sent to the provider
	@Column({ type: "text", nullable: true })
	documentDigest!: string | null;

	@Index({ unique: true })
	@Column({ type: "text", nullable: true })
	envelopeId!: string | null;

	@Column({ type: "text", enum: CONTRACT_STATUS, default: "draft" })
	status!: ContractStatus;

	@Column({ type: "text", nullable: true })
	signerEmail!: string | null;

	@Column({ type: "text", nullable: true })
	signerName!: string | null;

	@Column({ type: Date, nullable: true })
	sentAt!: Date | null;

	@Column({ type: Date, nullable: true })
	completedAt!: Date | null;

	@Column({ type: Date, nullable: true })
	declinedAt!: Date | null;

	@VersionColumn()
	version!: number;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}
