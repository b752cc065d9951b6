import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger";
import * as dotenv from "dotenv";
import { AppModule } from "./app.module";
import { configureApp } from "./app.setup";

dotenv.config();

async function bootstrap() {
	// raw body is needed to verify webhook signatures
	const app = await NestFactory.create(AppModule, { rawBody: true });

	configureApp(app);
	app.enableShutdownHooks();

	const config = new DocumentBuilder()
		.setTitle("Rental Contract Signing API")
		.setDescription(
			"Generates equipment rental contracts and tracks their e-signature lifecycle",
		)
		.setVersion("0.1.0")
		.build();
	const doc = SwaggerModule.createDocument(app, config);
	SwaggerModule.setup("api/v1/docs", app, doc, {
		swaggerOptions: {
			tagsSorter: "alpha",
			operationsSorter: "alpha",
		},
	});

	const port = parseInt(process.env.PORT ?? "3000", 10);
	await app.listen(port, "0.0.0.0");
	Logger.log(`API listening on http://0.0.0.0:${port}`, "Bootstrap");
}

bootstrap().catch((err: unknown) => {
	Logger.error(err instanceof Error ? err.stack : String(err), "Bootstrap");
	process.exit(1);
});
