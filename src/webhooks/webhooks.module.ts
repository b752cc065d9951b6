import { Module } from "@nestjs/common";

import { SigningWebhookController } from "./signing-webhook.controller";
import { WebhookReconcilerService } from "./webhook-reconciler.service";
import { WebhookSignatureGuard } from "./webhook-signature.guard";
import { EnvelopeStatusPoller } from "./envelope-status-poller.service";
import { ContractsModule } from "../contracts/contracts.module";
import { SignatureModule } from "../signature/signature.module";

@Module({
	imports: [ContractsModule, SignatureModule],
	providers: [WebhookReconcilerService, WebhookSignatureGuard, EnvelopeStatusPoller],
	controllers: [SigningWebhookController],
	exports: [WebhookReconcilerService],
})
export class WebhooksModule {}
