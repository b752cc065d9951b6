import {
	BadRequestException,
	Body,
	Controller,
	HttpCode,
	HttpStatus,
	Logger,
	NotFoundException,
	Post,
	UseGuards,
} from "@nestjs/common";
import {
	ApiBadRequestResponse,
	ApiBody,
	ApiNotFoundResponse,
	ApiOkResponse,
	ApiOperation,
	ApiTags,
	ApiUnauthorizedResponse,
} from "@nestjs/swagger";

import { parseEnvelopeEvent } from "./envelope-event";
import { ReconcileOutcome, WebhookReconcilerService } from "./webhook-reconciler.service";
import { WebhookSignatureGuard } from "./webhook-signature.guard";

export type WebhookAck = {
	message: string;
	outcome: Exclude<ReconcileOutcome["outcome"], "unknown-envelope">;
};

@ApiTags("Webhooks")
@Controller("api/v1/webhooks")
export class SigningWebhookController {
	private readonly logger = new Logger(SigningWebhookController.name);

	constructor(private readonly reconciler: WebhookReconcilerService) {}

	@Post("esign")
	@HttpCode(HttpStatus.OK)
	@UseGuards(WebhookSignatureGuard)
	@ApiOperation({ summary: "Envelope status notification from the e-signature provider" })
	@ApiBody({
		schema: {
			type: "object",
			required: ["envelopeId", "status"],
			properties: {
				envelopeId: { type: "string" },
				status: { type: "string", example: "completed" },
				statusChangedDateTime: { type: "string", format: "date-time" },
			},
		},
	})
	@ApiOkResponse({ description: "Event acknowledged" })
	@ApiBadRequestResponse({ description: "Missing envelopeId or status" })
	@ApiNotFoundResponse({ description: "No contract for this envelope" })
	@ApiUnauthorizedResponse({ description: "Bad HMAC signature" })
	async receive(@Body() payload: Record<string, unknown>): Promise<WebhookAck> {
		const parsed = parseEnvelopeEvent(payload);
		if (!parsed.ok) {
			this.logger.warn(`WebhookMalformed: ${parsed.reason}`);
			throw new BadRequestException({
				error: "WebhookMalformed",
				details: parsed.reason,
			});
		}

		const result = await this.reconciler.reconcile(parsed.event);
		if (result.outcome === "unknown-envelope") {
			throw new NotFoundException({
				error: "WebhookUnknownEnvelope",
				details: `No contract for envelope ${result.envelopeId}`,
			});
		}
		return { message: "Webhook processed successfully", outcome: result.outcome };
	}
}
