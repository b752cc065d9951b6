import { Module } from "@nestjs/common";
import axios from "axios";
import { DataAggregatorService } from "./data-aggregator.service";
import { EXTERNAL_HTTP } from "./aggregation.constants";

@Module({
	providers: [
		{
			provide: EXTERNAL_HTTP,
			useFactory: () =>
				axios.create({ headers: { Accept: "application/json" } }),
		},
		DataAggregatorService,
	],
	exports: [DataAggregatorService],
})
export class AggregationModule {}
