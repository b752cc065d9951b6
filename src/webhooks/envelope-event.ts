import {
	SigningEvent,
	toSigningEventKind,
} from "../contracts/contract-lifecycle";

export type ParsedEnvelopeEvent =
	| { ok: true; event: SigningEvent }
	| { ok: false; reason: string };

const nonEmptyString = (value: unknown): string | undefined =>
	typeof value === "string" && value.trim() !== "" ? value.trim() : undefined;

/** Missing or unparseable timestamps fall back to `now`. */
export function parseEventTime(value: unknown, now: Date): Date {
	const raw = nonEmptyString(value);
	if (!raw) return now;
	const parsed = new Date(raw);
	return Number.isNaN(parsed.getTime()) ? now : parsed;
}

/**
 * Reads `{ envelopeId, status, statusChangedDateTime? }`. Fields the service
 * does not model are ignored.
 */
export function parseEnvelopeEvent(
	payload: unknown,
	now = new Date(),
): ParsedEnvelopeEvent {
	if (typeof payload !== "object" || payload === null || Array.isArray(payload)) {
		return { ok: false, reason: "Body must be a JSON object" };
	}
	const body: Record<string, unknown> = { ...payload };
	const envelopeId = nonEmptyString(body.envelopeId);
	if (!envelopeId) {
		return { ok: false, reason: "Missing envelopeId" };
	}
	const status = nonEmptyString(body.status);
	if (!status) {
		return { ok: false, reason: "Missing status" };
	}
	return {
		ok: true,
		event: {
			envelopeId,
			kind: toSigningEventKind(status),
			status,
			occurredAt: parseEventTime(body.statusChangedDateTime, now),
		},
	};
}
