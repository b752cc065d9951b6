export function toError(err: unknown): Error {
	return err instanceof Error
		? err
		: new Error("Invalid error type", { cause: err });
}

export const PIPELINE_ERROR_CODES = [
	// per-record, degrades to absent data and never reaches the caller
	"FETCH_FAILED",
	"GENERATION_FAILED",
	// no provider interaction is attempted after this one
	"RENDER_FAILED",
	"AUTH_FAILED",
	// nothing was created on the provider side
	"SUBMISSION_FAILED",
	// envelope exists and is persisted, only the signing view is missing
	"SIGNING_URL_UNAVAILABLE",
	"MISSING_FIELDS",
	"INVALID_TERMS",
] as const;
export type PipelineErrorCode = (typeof PIPELINE_ERROR_CODES)[number];

const ERROR_NAMES: Record<PipelineErrorCode, string> = {
	FETCH_FAILED: "FetchFailed",
	GENERATION_FAILED: "GenerationFailed",
	RENDER_FAILED: "RenderFailed",
	AUTH_FAILED: "AuthFailed",
	SUBMISSION_FAILED: "SubmissionFailed",
	SIGNING_URL_UNAVAILABLE: "SigningUrlUnavailable",
	MISSING_FIELDS: "MissingFields",
	INVALID_TERMS: "InvalidTerms",
};

export type PipelineErrorContext = {
	envelopeId?: string;
	contractId?: string;
	missing?: string[];
};

/**
 * A failure of the contract generation pipeline. Exactly one of these reaches
 * the caller of the synchronous path; the exception filter turns it into the
 * consolidated error payload.
 */
export class ContractPipelineError extends Error {
	constructor(
		public readonly code: PipelineErrorCode,
		public readonly detail: string,
		public readonly context: PipelineErrorContext = {},
		options?: { cause?: unknown },
	) {
		super(`${ERROR_NAMES[code]}: ${detail}`, options);
		this.name = ERROR_NAMES[code];
	}

	static missingFields(missing: string[]): ContractPipelineError {
		return new ContractPipelineError(
			"MISSING_FIELDS",
			`Missing required fields: ${missing.join(", ")}`,
			{ missing },
		);
	}
}

export function isPipelineError(
	err: unknown,
	code?: PipelineErrorCode,
): err is ContractPipelineError {
	return (
		err instanceof ContractPipelineError &&
		(code === undefined || err.code === code)
	);
}

/** Best-effort human readable reason for a failed outbound call. */
export function describeFailure(err: unknown): string {
	const error = toError(err);
	if (error.cause instanceof Error && error.cause.message !== error.message) {
		return `${error.message} (${error.cause.message})`;
	}
	return error.message;
}
