import { generateKeyPairSync } from "node:crypto";
import type { INestApplication } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { Test } from "@nestjs/testing";
import request from "supertest";

import { AppModule } from "../src/app.module";
import { configureApp } from "../src/app.setup";
import { EXTERNAL_HTTP } from "../src/aggregation/aggregation.constants";
import { ESIGN_HTTP } from "../src/signature/signature.constants";
import { TEXT_GENERATION_CLIENT } from "../src/generation/text-generation.client";
import {
	CONTRACTS_CONFIG,
	loadContractsConfig,
} from "../src/config/contracts.config";

export const ESIGN_BASE = "http://esign.test/restapi";
export const ENVELOPES_URL = `${ESIGN_BASE}/v2.1/accounts/acct-1/envelopes`;
export const TOKEN_URL = "https://oauth.test/oauth/token";

export const CONTRACT_MARKUP = [
	"<html><body>",
	"<h1>Equipment Rental Contract</h1>",
	"<p>The owner rents the equipment to the client.</p>",
	"<ul><li>Drill x2</li></ul>",
	"</body></html>",
].join("\n");

const { privateKey } = generateKeyPairSync("rsa", {
	modulusLength: 2048,
	privateKeyEncoding: { type: "pkcs8", format: "pem" },
	publicKeyEncoding: { type: "spki", format: "pem" },
});

type Route = (body: unknown) => unknown;

/**
 * In-process stand-in for an axios instance: answers by URL (plus the `user`
 * query param for profile lookups) and fails like a refused connection for
 * anything it does not know.
 */
export class FakeHttp {
	readonly routes = new Map<string, Route>();
	readonly get = jest.fn(
		async (url: string, options?: { params?: { user?: string } }) =>
			this.answer(keyFor(url, options), undefined),
	);
	readonly post = jest.fn(
		async (url: string, body?: unknown, _options?: unknown) =>
			this.answer(url, body),
	);

	on(url: string, response: unknown) {
		this.routes.set(url, () => response);
		return this;
	}

	private answer(key: string, body: unknown) {
		const route = this.routes.get(key);
		if (!route) {
			throw new Error(`connect ECONNREFUSED ${key}`);
		}
		return { data: route(body) };
	}
}

function keyFor(url: string, options?: { params?: { user?: string } }) {
	return options?.params?.user ? `${url}?user=${options.params.user}` : url;
}

export type TestApp = {
	app: INestApplication;
	services: FakeHttp;
	esign: FakeHttp;
	textGeneration: { generate: jest.Mock };
};

export async function createTestApp(
	env: Record<string, string> = {},
): Promise<TestApp> {
	const services = new FakeHttp();
	const esign = new FakeHttp()
		.on(TOKEN_URL, { access_token: "test-token", expires_in: 3600 })
		.on(ENVELOPES_URL, { envelopeId: "env-1", status: "sent" })
		.on(`${ENVELOPES_URL}/env-1/views/recipient`, {
			url: "https://sign.test/env-1",
		});
	const textGeneration = {
		generate: jest.fn().mockResolvedValue(CONTRACT_MARKUP),
	};
	const config = loadContractsConfig(
		new ConfigService({
			PROFILE_SERVICE_URL: "http://profiles.test/profile/profil/",
			EQUIPMENT_SERVICE_URL: "http://equipment.test/api/stuffs/",
			RENTAL_REQUEST_SERVICE_URL: "http://rentals.test/rental/rental_requests/",
			ESIGN_BASE_PATH: ESIGN_BASE,
			ESIGN_OAUTH_HOST: "oauth.test",
			ESIGN_ACCOUNT_ID: "acct-1",
			ESIGN_INTEGRATION_KEY: "test-integration-key",
			ESIGN_USER_ID: "test-user",
			ESIGN_PRIVATE_KEY: privateKey,
			DEFAULT_SIGNER_EMAIL: "client@example.test",
			DEFAULT_RETURN_URL: "http://app.test/sign-status/",
			...env,
		}),
	);

	const moduleRef = await Test.createTestingModule({
		imports: [AppModule],
	})
		.overrideProvider(CONTRACTS_CONFIG)
		.useValue(config)
		.overrideProvider(EXTERNAL_HTTP)
		.useValue(services)
		.overrideProvider(ESIGN_HTTP)
		.useValue(esign)
		.overrideProvider(TEXT_GENERATION_CLIENT)
		.useValue(textGeneration)
		.compile();

	const app = moduleRef.createNestApplication({ rawBody: true });
	configureApp(app);
	await app.init();
	return { app, services, esign, textGeneration };
}

/** Registers the records of one rental: owner 7, client 9, equipment 12, request 42. */
export function stubRentalRecords(services: FakeHttp) {
	services
		.on("http://profiles.test/profile/profil/?user=9", [{ first_name: "Amal" }])
		.on("http://equipment.test/api/stuffs/12/", { stuffname: "Drill" })
		.on("http://rentals.test/rental/rental_requests/42/", {
			id: 42,
			status: "active",
			quantity: 2,
			total_price: "150.00",
			start_date: "2025-05-01",
			end_date: "2025-05-04",
		});
}

export const generateBody = {
	ownerId: 7,
	clientId: 9,
	equipmentId: [12],
	requestId: 42,
};

export function generateContract(
	app: INestApplication,
	body: object = generateBody,
) {
	return request(app.getHttpServer())
		.post("/api/v1/contracts/generate")
		.send(body);
}
