import { Module } from "@nestjs/common";
import axios from "axios";

import { ESIGN_HTTP } from "./signature.constants";
import { ESignAuthService } from "./esign-auth.service";
import { ESignClientService } from "./esign-client.service";
import { SignatureGatewayService } from "./signature-gateway.service";
import { ContractsModule } from "../contracts/contracts.module";

@Module({
	imports: [ContractsModule],
	providers: [
		{
			provide: ESIGN_HTTP,
			useFactory: () =>
				axios.create({ headers: { Accept: "application/json" } }),
		},
		ESignAuthService,
		ESignClientService,
		SignatureGatewayService,
	],
	exports: [SignatureGatewayService, ESignClientService],
})
export class SignatureModule {}
