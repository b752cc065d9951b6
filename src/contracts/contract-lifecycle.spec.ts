import {
	ContractStatus,
	decideSigningTransition,
	isFinalStatus,
	nextStatus,
	SigningEventKind,
	SigningSnapshot,
	toSigningEventKind,
} from "./contract-lifecycle";

type Snapshot = {
	status: ContractStatus;
	sentAt: Date | null;
	completedAt: Date | null;
	declinedAt: Date | null;
};

const submitted = (): Snapshot => ({
	status: "sent_for_signing",
	sentAt: null,
	completedAt: null,
	declinedAt: null,
});

function applyAll(
	start: Snapshot,
	events: Array<{ kind: SigningEventKind; at: Date }>,
): Snapshot {
	let current = { ...start };
	for (const event of events) {
		const decision = decideSigningTransition(current, {
			kind: event.kind,
			occurredAt: event.at,
		});
		if (decision.type === "apply") {
			const next: Snapshot = { ...current, status: decision.to };
			next[decision.timestampField] = event.at;
			current = next;
		}
	}
	return current;
}

const NOON = new Date(Date.UTC(2025, 0, 1, 12, 0, 0));
const at = (kind: SigningEventKind, occurredAt = NOON) => ({ kind, occurredAt });

function permutations<T>(items: T[]): T[][] {
	if (items.length <= 1) return [items];
	const result: T[][] = [];
	items.forEach((item, i) => {
		const rest = [...items.slice(0, i), ...items.slice(i + 1)];
		for (const tail of permutations(rest)) {
			result.push([item, ...tail]);
		}
	});
	return result;
}

describe("contract lifecycle", () => {
	describe("nextStatus", () => {
		it("should only allow submission from draft", () => {
			expect(nextStatus("draft", "submit")).toBe("sent_for_signing");
			expect(nextStatus("sent_for_signing", "submit")).toBeUndefined();
			expect(nextStatus("completed", "submit")).toBeUndefined();
		});

		it("should never lead back to draft", () => {
			const actions = ["submit", "sent", "completed", "declined"] as const;
			const statuses: ContractStatus[] = [
				"sent_for_signing",
				"sent",
				"completed",
				"declined",
			];
			for (const from of statuses) {
				for (const action of actions) {
					expect(nextStatus(from, action)).not.toBe("draft");
				}
			}
		});
	});

	it("should treat completed and declined as final", () => {
		expect(isFinalStatus("completed")).toBe(true);
		expect(isFinalStatus("declined")).toBe(true);
		expect(isFinalStatus("sent")).toBe(false);
		expect(isFinalStatus("sent_for_signing")).toBe(false);
	});

	describe("toSigningEventKind", () => {
		it("should match tokens case-insensitively", () => {
			expect(toSigningEventKind("Completed")).toBe("completed");
			expect(toSigningEventKind(" DECLINED ")).toBe("declined");
			expect(toSigningEventKind("sent")).toBe("sent");
		});

		it("should flag anything else as unrecognized", () => {
			expect(toSigningEventKind("delivered")).toBe("unrecognized");
			expect(toSigningEventKind("")).toBe("unrecognized");
		});
	});

	describe("decideSigningTransition", () => {
		it("should move a submitted contract to sent", () => {
			expect(decideSigningTransition(submitted(), at("sent"))).toEqual({
				type: "apply",
				from: "sent_for_signing",
				to: "sent",
				timestampField: "sentAt",
			});
		});

		it("should let completed overtake sent", () => {
			const sent: SigningSnapshot = {
				...submitted(),
				status: "sent",
				sentAt: new Date(),
			};
			expect(decideSigningTransition(sent, at("completed"))).toEqual({
				type: "apply",
				from: "sent",
				to: "completed",
				timestampField: "completedAt",
			});
		});

		it("should never overturn a final status", () => {
			const completed: SigningSnapshot = {
				...submitted(),
				status: "completed",
				completedAt: new Date(),
			};
			expect(decideSigningTransition(completed, at("sent"))).toEqual({
				type: "noop",
				reason: "final",
			});
			expect(decideSigningTransition(completed, at("declined"))).toEqual({
				type: "noop",
				reason: "final",
			});
			expect(decideSigningTransition(completed, at("completed"))).toEqual({
				type: "noop",
				reason: "final",
			});
		});

		it("should ignore an exact replay of a sent notification", () => {
			const sent: SigningSnapshot = {
				...submitted(),
				status: "sent",
				sentAt: NOON,
			};
			expect(decideSigningTransition(sent, at("sent"))).toEqual({
				type: "noop",
				reason: "duplicate",
			});
		});

		it("should move the sent timestamp when sent is reported again later", () => {
			const sent: SigningSnapshot = {
				...submitted(),
				status: "sent",
				sentAt: NOON,
			};
			const later = new Date(Date.UTC(2025, 0, 1, 14, 0, 0));
			expect(decideSigningTransition(sent, at("sent", later))).toEqual({
				type: "apply",
				from: "sent",
				to: "sent",
				timestampField: "sentAt",
			});
		});

		it("should ignore unrecognized statuses", () => {
			expect(decideSigningTransition(submitted(), at("unrecognized"))).toEqual({
				type: "noop",
				reason: "unrecognized-status",
			});
		});

		it("should refuse events for a contract that was never submitted", () => {
			expect(
				decideSigningTransition({ status: "draft" }, at("completed")),
			).toEqual({ type: "noop", reason: "not-submitted" });
		});
	});

	describe("event ordering", () => {
		const t = (minute: number) =>
			new Date(Date.UTC(2025, 0, 1, 12, minute, 0));

		it.each<[SigningEventKind, ContractStatus, keyof Snapshot]>([
			["completed", "completed", "completedAt"],
			["declined", "declined", "declinedAt"],
		])(
			"should converge on %s whatever order the events arrive in",
			(terminal, expected, field) => {
				const events = [
					{ kind: "sent" as const, at: t(1) },
					{ kind: terminal, at: t(2) },
					{ kind: "sent" as const, at: t(3) },
					{ kind: "unrecognized" as const, at: t(4) },
				];
				for (const order of permutations(events)) {
					const final = applyAll(submitted(), order);
					expect(final.status).toBe(expected);
					expect(final[field]).toEqual(t(2));
				}
			},
		);

		it("should reach the same state when one event is replayed", () => {
			const event = { kind: "completed" as const, at: t(5) };
			const once = applyAll(submitted(), [event]);
			const many = applyAll(submitted(), [event, event, event, event]);
			expect(many).toEqual(once);
			expect(once).toEqual({
				status: "completed",
				sentAt: null,
				completedAt: t(5),
				declinedAt: null,
			});
		});

		it("should keep the last sent timestamp", () => {
			const final = applyAll(submitted(), [
				{ kind: "sent", at: t(1) },
				{ kind: "sent", at: t(9) },
				{ kind: "sent", at: t(9) },
			]);
			expect(final.status).toBe("sent");
			expect(final.sentAt).toEqual(t(9));
		});
	});
});
