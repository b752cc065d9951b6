import { ConfigService } from "@nestjs/config";

export const CONTRACTS_CONFIG = Symbol("CONTRACTS_CONFIG");

export type ExternalServicesConfig = {
	profileUrl: string;
	rentalRequestUrl: string;
	equipmentUrl: string;
	timeoutMs: number;
};

export type TextGenerationConfig = {
	apiKey?: string;
	model: string;
	timeoutMs: number;
	maxTokens: number;
	currency: string;
};

export type ESignConfig = {
	basePath: string;
	oauthHost: string;
	integrationKey: string;
	userId: string;
	accountId: string;
	privateKey: string;
	tokenTtlSeconds: number;
	timeoutMs: number;
	webhookUrl: string;
	webhookSecret?: string;
};

export type SigningDefaultsConfig = {
	signerEmail?: string;
	returnUrl: string;
};

export type EnvelopePollerConfig = {
	/** 0 disables the poller */
	intervalMs: number;
	batchSize: number;
};

/**
 * Everything the pipeline needs to talk to the outside world. Built once at
 * boot and handed to each component through the `CONTRACTS_CONFIG` token.
 */
export type ContractsConfig = Readonly<{
	services: Readonly<ExternalServicesConfig>;
	generation: Readonly<TextGenerationConfig>;
	esign: Readonly<ESignConfig>;
	signing: Readonly<SigningDefaultsConfig>;
	poller: Readonly<EnvelopePollerConfig>;
}>;

function readNumber(
	config: ConfigService,
	key: string,
	fallback: number,
): number {
	const raw = config.get<string>(key);
	if (raw === undefined || raw.trim() === "") return fallback;
	const parsed = Number(raw);
	if (!Number.isFinite(parsed) || parsed < 0) {
		throw new Error(`${key} must be a non-negative number, got "${raw}"`);
	}
	return parsed;
}

function readString(
	config: ConfigService,
	key: string,
	fallback = "",
): string {
	const raw = config.get<string>(key);
	return raw === undefined || raw.trim() === "" ? fallback : raw.trim();
}

function readOptional(config: ConfigService, key: string): string | undefined {
	const value = readString(config, key);
	return value === "" ? undefined : value;
}

export function loadContractsConfig(config: ConfigService): ContractsConfig {
	return Object.freeze({
		services: Object.freeze({
			profileUrl: readString(
				config,
				"PROFILE_SERVICE_URL",
				"http://localhost:8008/profile/profil/",
			),
			rentalRequestUrl: readString(
				config,
				"RENTAL_REQUEST_SERVICE_URL",
				"http://localhost:8015/rental/rental_requests/",
			),
			equipmentUrl: readString(
				config,
				"EQUIPMENT_SERVICE_URL",
				"http://localhost:8006/api/stuffs/",
			),
			timeoutMs: readNumber(config, "EXTERNAL_FETCH_TIMEOUT_MS", 5_000),
		}),
		generation: Object.freeze({
			apiKey: readOptional(config, "TEXT_GENERATION_API_KEY"),
			model: readString(
				config,
				"TEXT_GENERATION_MODEL",
				"claude-3-5-haiku-latest",
			),
			timeoutMs: readNumber(config, "TEXT_GENERATION_TIMEOUT_MS", 60_000),
			maxTokens: readNumber(config, "TEXT_GENERATION_MAX_TOKENS", 4_096),
			currency: readString(config, "CURRENCY", "TND"),
		}),
		esign: Object.freeze({
			basePath: readString(
				config,
				"ESIGN_BASE_PATH",
				"https://demo.docusign.net/restapi",
			),
			oauthHost: readString(config, "ESIGN_OAUTH_HOST", "account-d.docusign.com"),
			integrationKey: readString(config, "ESIGN_INTEGRATION_KEY"),
			userId: readString(config, "ESIGN_USER_ID"),
			accountId: readString(config, "ESIGN_ACCOUNT_ID"),
			// env files usually carry the PEM on one line with escaped newlines
			privateKey: readString(config, "ESIGN_PRIVATE_KEY").replace(/\\n/g, "\n"),
			tokenTtlSeconds: readNumber(config, "ESIGN_TOKEN_TTL_SECONDS", 3_600),
			timeoutMs: readNumber(config, "ESIGN_TIMEOUT_MS", 10_000),
			webhookUrl: readString(
				config,
				"ESIGN_WEBHOOK_URL",
				"http://localhost:3000/api/v1/webhooks/esign",
			),
			webhookSecret: readOptional(config, "ESIGN_WEBHOOK_SECRET"),
		}),
		signing: Object.freeze({
			signerEmail: readOptional(config, "DEFAULT_SIGNER_EMAIL"),
			returnUrl: readString(
				config,
				"DEFAULT_RETURN_URL",
				"http://localhost:5173/client/sign-status/",
			),
		}),
		poller: Object.freeze({
			intervalMs: readNumber(config, "ENVELOPE_POLL_INTERVAL_MS", 0),
			batchSize: readNumber(config, "ENVELOPE_POLL_BATCH_SIZE", 25),
		}),
	});
}
