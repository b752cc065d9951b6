import type {
	AggregatedContext,
	EquipmentRecord,
	ProfileRecord,
} from "../aggregation/external-records";
import type { ResolvedContractTerms } from "./contract-terms";

export type ContractPromptInput = {
	context: AggregatedContext;
	terms: ResolvedContractTerms;
	currency: string;
	/** used when the rental request carries no status */
	statusHint?: string;
};

const text = (value: string | null | undefined) => value ?? "";

function fullName(profile: ProfileRecord | null): string {
	return `${text(profile?.first_name)} ${text(profile?.last_name)}`.trim();
}

function postalAddress(profile: ProfileRecord | null): string {
	const address = profile?.address;
	return [
		address?.street,
		address?.city,
		address?.state,
		address?.postal_code,
		address?.country,
	]
		.map(text)
		.filter((part) => part !== "")
		.join(", ");
}

function profileSection(title: string, profile: ProfileRecord | null): string[] {
	return [
		`${title}:`,
		`- Full Name: ${fullName(profile)}`,
		`- Phone: ${text(profile?.phone)}`,
		`- Address: ${postalAddress(profile)}`,
	];
}

function equipmentSection(
	equipment: EquipmentRecord | null,
	heading: string,
	currency: string,
): string[] {
	const price = text(equipment?.price_per_day);
	return [
		`${heading}:`,
		`- Name: ${text(equipment?.stuffname)}`,
		`- Brand: ${text(equipment?.brand)}`,
		`- Location: ${text(equipment?.location)}`,
		`- Price per day: ${price === "" ? "" : `${price} ${currency}`}`,
		`- Condition: ${text(equipment?.state)}`,
		`- Rental Location: ${text(equipment?.rental_location)}`,
		`- Description: ${text(equipment?.short_description)}`,
		"",
		"Detailed Description:",
		text(equipment?.detailed_description),
	];
}

/**
 * Builds the instruction sent to the text generation service. Same inputs,
 * same prompt: nothing here depends on time or randomness.
 */
export function buildContractPrompt({
	context,
	terms,
	currency,
	statusHint,
}: ContractPromptInput): string {
	const request = context.request;
	const status = text(request?.status) || text(statusHint);
	const quantity = text(request?.quantity);
	const items = context.equipment.length > 0 ? context.equipment : [null];

	const lines = [
		"Generate a professional HTML equipment rental contract based on the following data:",
		"",
		"Rental Request Details:",
		`- Request ID: ${text(request?.id) || "N/A"}`,
		`- Status: ${status || "N/A"}`,
		`- Quantity: ${quantity || "N/A"}`,
		"",
		"Contract Terms:",
		`- Owner Name: ${terms.ownerName}`,
		`- Client Name: ${terms.clientName}`,
		`- Start Date: ${terms.startDate}`,
		`- End Date: ${terms.endDate}`,
		`- Total Value: ${terms.totalValue.toFixed(2)} ${currency}`,
		`- Equipment ID: ${text(terms.equipment)}`,
		"",
		...profileSection("Owner Profile", context.owner),
		"",
		...profileSection("Client Profile", context.client),
		"",
		...items.flatMap((item, i) => [
			...equipmentSection(
				item,
				items.length > 1
					? `Equipment Information (${i + 1} of ${items.length})`
					: "Equipment Information",
				currency,
			),
			"",
		]),
		"Please return a well-structured HTML contract that includes:",
		"1. Parties' names and contact information",
		`2. Equipment details including quantity (${quantity || "1"})`,
		"3. Rental terms including dates and total value",
		`4. Special conditions based on request status (${status || "active"})`,
		"5. Signature sections for both parties",
		"6. Cancellation policy if status is 'canceled'",
	];
	if (status.toLowerCase() === "canceled") {
		lines.push(
			"The request is canceled: the special conditions must state the cancellation policy and any fees that apply.",
		);
	}
	lines.push("Return only the HTML document, without commentary.");
	return lines.join("\n");
}
