import { Global, Logger, Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { CONTRACTS_CONFIG, loadContractsConfig } from "./contracts.config";

@Global()
@Module({
	providers: [
		{
			provide: CONTRACTS_CONFIG,
			inject: [ConfigService],
			useFactory: (cfg: ConfigService) => {
				const config = loadContractsConfig(cfg);
				Logger.log(
					`ESIGN_BASE_PATH=${config.esign.basePath} ESIGN_OAUTH_HOST=${config.esign.oauthHost}`,
					"ContractsConfigModule",
				);
				return config;
			},
		},
	],
	exports: [CONTRACTS_CONFIG],
})
export class ContractsConfigModule {}
