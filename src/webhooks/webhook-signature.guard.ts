import {
	CanActivate,
	ExecutionContext,
	Inject,
	Injectable,
	Logger,
	UnauthorizedException,
} from "@nestjs/common";
import type { RawBodyRequest } from "@nestjs/common";
import type { Request } from "express";
import { timingSafeEqual } from "node:crypto";
import { hmac } from "@noble/hashes/hmac";
import { sha256 } from "@noble/hashes/sha2";
import { utf8ToBytes } from "@noble/hashes/utils";

import { CONTRACTS_CONFIG, ContractsConfig } from "../config/contracts.config";

export const SIGNATURE_HEADER = "x-docusign-signature-1";

export function digestPayload(secret: string, body: Uint8Array): Uint8Array {
	return hmac(sha256, utf8ToBytes(secret), body);
}

/** base64 HMAC-SHA256 of the raw request body, as the provider signs it. */
export function signPayload(secret: string, body: Uint8Array): string {
	return Buffer.from(digestPayload(secret, body)).toString("base64");
}

/** Compares a base64 signature header with the expected digest in constant time. */
export function matchesSignature(header: string, expected: Uint8Array): boolean {
	const provided = Buffer.from(header.trim(), "base64");
	// the digest length is public, only the bytes need a constant-time compare
	if (provided.length !== expected.length) return false;
	return timingSafeEqual(provided, expected);
}

/**
 * Rejects webhook deliveries whose HMAC does not match. Without a configured
 * secret every delivery is let through.
 */
@Injectable()
export class WebhookSignatureGuard implements CanActivate {
	private readonly logger = new Logger(WebhookSignatureGuard.name);

	constructor(@Inject(CONTRACTS_CONFIG) private readonly config: ContractsConfig) {}

	canActivate(context: ExecutionContext): boolean {
		const secret = this.config.esign.webhookSecret;
		if (!secret) return true;

		const req = context.switchToHttp().getRequest<RawBodyRequest<Request>>();
		const signature = req.header(SIGNATURE_HEADER);
		if (!signature || !req.rawBody) {
			this.logger.warn("Webhook delivery without a signature rejected");
			throw new UnauthorizedException("Missing webhook signature");
		}
		if (!matchesSignature(signature, digestPayload(secret, req.rawBody))) {
			this.logger.warn("Webhook delivery with a bad signature rejected");
			throw new UnauthorizedException("Invalid webhook signature");
		}
		return true;
	}
}
