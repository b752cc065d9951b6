import { Inject, Injectable, Logger } from "@nestjs/common";
import axios from "axios";

import { ESignAuthService, ESignHttp } from "./esign-auth.service";
import { ESIGN_HTTP } from "./signature.constants";
import type { EnvelopeDefinition, RecipientViewRequest } from "./envelope-definition";
import {
	EnvelopeStatusResponse,
	EnvelopeSummaryResponse,
	RecipientViewResponse,
	parseProviderResponse,
} from "./esign-responses";
import { CONTRACTS_CONFIG, ContractsConfig } from "../config/contracts.config";

/** Status of an envelope as the provider reports it. */
export type EnvelopeStatus = {
	envelopeId: string;
	status: string;
	statusChangedDateTime?: string;
};

/** Appends the provider's error body, which carries its error code. */
export function describeProviderError(err: unknown): string {
	if (axios.isAxiosError(err) && err.response) {
		const body = JSON.stringify(err.response.data) ?? "";
		return `${err.message}: ${body.slice(0, 300)}`;
	}
	return err instanceof Error ? err.message : String(err);
}

/**
 * Thin client for the envelope REST API. Errors are thrown as they come;
 * callers decide which pipeline failure they amount to.
 */
@Injectable()
export class ESignClientService {
	private readonly logger = new Logger(ESignClientService.name);

	constructor(
		@Inject(ESIGN_HTTP) private readonly http: ESignHttp,
		private readonly auth: ESignAuthService,
		@Inject(CONTRACTS_CONFIG) private readonly config: ContractsConfig,
	) {}

	private envelopesUrl(...segments: string[]): string {
		const { basePath, accountId } = this.config.esign;
		const base = basePath.replace(/\/+$/, "");
		return [
			`${base}/v2.1/accounts/${encodeURIComponent(accountId)}/envelopes`,
			...segments.map(encodeURIComponent),
		].join("/");
	}

	private async requestOptions() {
		const token = await this.auth.getAccessToken();
		return {
			headers: { Authorization: `Bearer ${token}` },
			timeout: this.config.esign.timeoutMs,
		};
	}

	private async call<T>(request: () => Promise<T>): Promise<T> {
		try {
			return await request();
		} catch (err) {
			if (axios.isAxiosError(err) && err.response?.status === 401) {
				this.auth.invalidate();
			}
			throw err;
		}
	}

	async createEnvelope(definition: EnvelopeDefinition): Promise<string> {
		const options = await this.requestOptions();
		const { data } = await this.call(() =>
			this.http.post<unknown>(this.envelopesUrl(), definition, options),
		);
		const summary = parseProviderResponse(
			EnvelopeSummaryResponse,
			data,
			"envelope creation",
		);
		this.logger.log(`Envelope ${summary.envelopeId} created`);
		return summary.envelopeId;
	}

	async createRecipientView(
		envelopeId: string,
		request: RecipientViewRequest,
	): Promise<string> {
		const options = await this.requestOptions();
		const { data } = await this.call(() =>
			this.http.post<unknown>(
				this.envelopesUrl(envelopeId, "views", "recipient"),
				request,
				options,
			),
		);
		return parseProviderResponse(RecipientViewResponse, data, "recipient view")
			.url;
	}

	async getEnvelopeStatus(envelopeId: string): Promise<EnvelopeStatus> {
		const options = await this.requestOptions();
		const { data } = await this.call(() =>
			this.http.get<unknown>(this.envelopesUrl(envelopeId), options),
		);
		const envelope = parseProviderResponse(
			EnvelopeStatusResponse,
			data,
			"envelope status",
		);
		return {
			envelopeId: envelope.envelopeId,
			status: envelope.status,
			statusChangedDateTime: envelope.statusChangedDateTime,
		};
	}
}
