import { Inject, Injectable, Logger } from "@nestjs/common";
import type { AxiosInstance } from "axios";
import jwt from "jsonwebtoken";

import {
	ESIGN_HTTP,
	OAUTH_GRANT_TYPE,
	OAUTH_SCOPE,
	TOKEN_RENEWAL_MARGIN_MS,
} from "./signature.constants";
import { OAuthTokenResponse, parseProviderResponse } from "./esign-responses";
import { CONTRACTS_CONFIG, ContractsConfig } from "../config/contracts.config";
import { ContractPipelineError, describeFailure } from "../common/errors";

export type ESignHttp = Pick<AxiosInstance, "get" | "post">;

type CachedToken = { value: string; expiresAt: number };

/**
 * Obtains bearer tokens from the provider through the JWT grant: a short
 * RS256 assertion signed with the integration's private key is exchanged
 * for an access token.
 */
@Injectable()
export class ESignAuthService {
	private readonly logger = new Logger(ESignAuthService.name);
	private cached: CachedToken | null = null;
	private inFlight: Promise<string> | null = null;

	constructor(
		@Inject(ESIGN_HTTP) private readonly http: ESignHttp,
		@Inject(CONTRACTS_CONFIG) private readonly config: ContractsConfig,
	) {}

	async getAccessToken(): Promise<string> {
		if (this.cached && this.cached.expiresAt - TOKEN_RENEWAL_MARGIN_MS > Date.now()) {
			return this.cached.value;
		}
		if (!this.inFlight) {
			this.inFlight = this.requestToken().finally(() => {
				this.inFlight = null;
			});
		}
		return this.inFlight;
	}

	/** Forgets the cached token, e.g. after the provider rejected it. */
	invalidate() {
		this.cached = null;
	}

	private signAssertion(): string {
		const { integrationKey, userId, oauthHost, privateKey, tokenTtlSeconds } =
			this.config.esign;
		const missing = [
			integrationKey ? undefined : "ESIGN_INTEGRATION_KEY",
			userId ? undefined : "ESIGN_USER_ID",
			privateKey ? undefined : "ESIGN_PRIVATE_KEY",
		].filter((m): m is string => m !== undefined);
		if (missing.length > 0) {
			throw new ContractPipelineError(
				"AUTH_FAILED",
				`E-signature credentials are not configured: ${missing.join(", ")}`,
			);
		}

		const now = Math.floor(Date.now() / 1000);
		try {
			return jwt.sign(
				{
					iss: integrationKey,
					sub: userId,
					aud: oauthHost,
					iat: now,
					exp: now + tokenTtlSeconds,
					scope: OAUTH_SCOPE,
				},
				privateKey,
				{ algorithm: "RS256" },
			);
		} catch (err) {
			throw new ContractPipelineError(
				"AUTH_FAILED",
				`Could not sign the token assertion: ${describeFailure(err)}`,
				{},
				{ cause: err },
			);
		}
	}

	private async requestToken(): Promise<string> {
		const assertion = this.signAssertion();
		const { oauthHost, timeoutMs, tokenTtlSeconds } = this.config.esign;

		let token: OAuthTokenResponse;
		try {
			const { data } = await this.http.post<unknown>(
				`https://${oauthHost}/oauth/token`,
				new URLSearchParams({
					grant_type: OAUTH_GRANT_TYPE,
					assertion,
				}).toString(),
				{
					headers: { "Content-Type": "application/x-www-form-urlencoded" },
					timeout: timeoutMs,
				},
			);
			token = parseProviderResponse(OAuthTokenResponse, data, "token exchange");
		} catch (err) {
			this.logger.error(`AuthFailed: ${describeFailure(err)}`);
			throw new ContractPipelineError(
				"AUTH_FAILED",
				`Token exchange with ${oauthHost} failed: ${describeFailure(err)}`,
				{},
				{ cause: err },
			);
		}

		const lifetimeSeconds = token.expires_in ?? tokenTtlSeconds;
		this.cached = {
			value: token.access_token,
			expiresAt: Date.now() + lifetimeSeconds * 1000,
		};
		this.logger.debug(`Obtained e-signature token valid for ${lifetimeSeconds}s`);
		return token.access_token;
	}
}
