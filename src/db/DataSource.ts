import { ConfigService } from "@nestjs/config";
import { TypeOrmModuleOptions } from "@nestjs/typeorm";
import { RentalContract } from "../contracts/rental-contract.entity";

/**
 * Tests run on an in-memory SQLite database. Outside tests Postgres is used
 * when all POSTGRES_* variables are set, a SQLite file otherwise.
 */
export function buildDataSourceConfig(
	config: ConfigService,
): TypeOrmModuleOptions {
	const env = config.get<string>("NODE_ENV", "development");
	const base = {
		entities: [RentalContract],
		synchronize: true,
		logging: env === "development",
	};
	if (env === "test") {
		return { ...base, type: "sqlite" as const, database: ":memory:", logging: false };
	}

	const host = config.get<string>("POSTGRES_HOST");
	const port = config.get<string>("POSTGRES_PORT");
	const username = config.get<string>("POSTGRES_USER");
	const password = config.get<string>("POSTGRES_PASSWORD");
	const database = config.get<string>("POSTGRES_DB");
	if (host && port && username && password && database) {
		return {
			...base,
			type: "postgres" as const,
			host,
			port: Number(port),
			username,
			password,
			database,
		};
	}
	if (host || database) {
		throw new Error(
			`Missing Postgres env vars. Host ${host}, port ${port}, user ${username}, password ${password ? "set" : "unset"}, db ${database}`,
		);
	}

	return {
		...base,
		type: "sqlite" as const,
		database: config.get<string>("SQLITE_DB_PATH", "data/contracts.sqlite"),
	};
}
