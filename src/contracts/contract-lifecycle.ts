/**
 * Rental contract lifecycle.
 *
 *   draft ──submit──▶ sent_for_signing ──sent──▶ sent
 *                          │  │                   │ │
 *                          │  └──completed────────┼─┴──▶ completed (final)
 *                          └─────declined─────────┴────▶ declined  (final)
 *
 * Signing events come from the provider in any order and any number of times.
 * Once a final state is reached every later event is acknowledged and dropped.
 */

export const CONTRACT_STATUS = [
	"draft",
	"sent_for_signing",
	"sent",
	"completed",
	"declined",
] as const;
export type ContractStatus = (typeof CONTRACT_STATUS)[number];

/** Envelope status tokens this service models. */
export const SIGNING_EVENT_STATUS = ["sent", "completed", "declined"] as const;
export type SigningEventStatus = (typeof SIGNING_EVENT_STATUS)[number];

export type SigningEventKind = SigningEventStatus | "unrecognized";

export type LifecycleAction = "submit" | SigningEventStatus;

export type SigningTimestampField = "sentAt" | "completedAt" | "declinedAt";

export const TIMESTAMP_FIELD_BY_EVENT: Record<
	SigningEventStatus,
	SigningTimestampField
> = {
	sent: "sentAt",
	completed: "completedAt",
	declined: "declinedAt",
};

type LifecycleState = {
	name: ContractStatus;
	isFinal: boolean;
	description: string;
};

type LifecycleTransition = {
	from: ContractStatus | ContractStatus[];
	action: LifecycleAction;
	to: ContractStatus;
};

const AWAITING_SIGNATURE: ContractStatus[] = ["sent_for_signing", "sent"];

export const CONTRACT_LIFECYCLE = {
	initialState: "draft",
	states: [
		{
			name: "draft",
			isFinal: false,
			description: "Document generated, not yet submitted to the provider",
		},
		{
			name: "sent_for_signing",
			isFinal: false,
			description: "Envelope created and its id stored on the contract",
		},
		{
			name: "sent",
			isFinal: false,
			description: "Provider reported the envelope as delivered to signers",
		},
		{ name: "completed", isFinal: true, description: "Signed by all parties" },
		{ name: "declined", isFinal: true, description: "Declined by a signer" },
	],
	transitions: [
		{ from: "draft", action: "submit", to: "sent_for_signing" },
		{ from: AWAITING_SIGNATURE, action: "sent", to: "sent" },
		{ from: AWAITING_SIGNATURE, action: "completed", to: "completed" },
		{ from: AWAITING_SIGNATURE, action: "declined", to: "declined" },
	],
} satisfies {
	initialState: ContractStatus;
	states: LifecycleState[];
	transitions: LifecycleTransition[];
};

const FINAL_STATES = new Set<ContractStatus>(
	CONTRACT_LIFECYCLE.states.filter((s) => s.isFinal).map((s) => s.name),
);

const TRANSITIONS = new Map<string, ContractStatus>();
for (const transition of CONTRACT_LIFECYCLE.transitions) {
	const froms = Array.isArray(transition.from)
		? transition.from
		: [transition.from];
	for (const from of froms) {
		TRANSITIONS.set(`${from}:${transition.action}`, transition.to);
	}
}

export function isFinalStatus(status: ContractStatus): boolean {
	return FINAL_STATES.has(status);
}

export function isContractStatus(value: string): value is ContractStatus {
	return CONTRACT_STATUS.some((status) => status === value);
}

/** Target state of `action` from `from`, or `undefined` when not allowed. */
export function nextStatus(
	from: ContractStatus,
	action: LifecycleAction,
): ContractStatus | undefined {
	return TRANSITIONS.get(`${from}:${action}`);
}

/** Case-insensitive match of a provider status token. */
export function toSigningEventKind(token: string): SigningEventKind {
	const normalized = token.trim().toLowerCase();
	return SIGNING_EVENT_STATUS.find((s) => s === normalized) ?? "unrecognized";
}

export type SigningSnapshot = {
	status: ContractStatus;
} & Partial<Record<SigningTimestampField, Date | null>>;

export type NoopReason =
	| "final"
	| "duplicate"
	| "not-submitted"
	| "unrecognized-status";

export type TransitionDecision =
	| {
			type: "apply";
			from: ContractStatus;
			to: ContractStatus;
			timestampField: SigningTimestampField;
	  }
	| { type: "noop"; reason: NoopReason };

/**
 * Decides what a signing event does to a contract. Pure: the caller owns the
 * read-modify-write and must re-decide on a fresh snapshot if the write loses
 * a race.
 *
 * Timestamps are last-write: a repeated event at a new time moves its
 * timestamp, an exact replay is a duplicate.
 */
export function decideSigningTransition(
	contract: SigningSnapshot,
	event: Pick<SigningEvent, "kind" | "occurredAt">,
): TransitionDecision {
	const { kind } = event;
	if (isFinalStatus(contract.status)) {
		return { type: "noop", reason: "final" };
	}
	if (kind === "unrecognized") {
		return { type: "noop", reason: "unrecognized-status" };
	}
	const to = nextStatus(contract.status, kind);
	if (to === undefined) {
		return { type: "noop", reason: "not-submitted" };
	}
	const timestampField = TIMESTAMP_FIELD_BY_EVENT[kind];
	const recorded = contract[timestampField];
	if (
		to === contract.status &&
		recorded &&
		recorded.getTime() === event.occurredAt.getTime()
	) {
		return { type: "noop", reason: "duplicate" };
	}
	return { type: "apply", from: contract.status, to, timestampField };
}

/** One provider notification, already validated. */
export type SigningEvent = {
	envelopeId: string;
	kind: SigningEventKind;
	/** token as the provider sent it */
	status: string;
	occurredAt: Date;
};
