import {
	Controller,
	DefaultValuePipe,
	Get,
	Param,
	ParseIntPipe,
	Query,
	Sse,
} from "@nestjs/common";
import {
	ApiNotFoundResponse,
	ApiOkResponse,
	ApiOperation,
	ApiQuery,
	ApiTags,
} from "@nestjs/swagger";
import { map, Observable } from "rxjs";

import { RentalContractsService } from "./rental-contracts.service";
import { GetRentalContractDto } from "./dto/get-rental-contract.dto";
import { ParseContractStatusPipe } from "./contract-status.pipe";
import { CONTRACT_STATUS, ContractStatus } from "./contract-lifecycle";
import {
	ApiEnvelope,
	ApiPaginatedEnvelope,
	Cursor,
	envelope,
	getSchemaPathForDto,
	getSchemaPathForPaginatedDto,
	paginatedEnvelope,
} from "../common/dto/envelopes";
import { ParseContractCursorPipe } from "./contract-cursor.pipe";
import {
	ServerSentEventsService,
	SseEvent,
} from "../common/server-sent-events.service";

@ApiTags("Rental Contracts")
@Controller("api/v1/contracts")
export class RentalContractsController {
	constructor(
		private readonly service: RentalContractsService,
		private readonly sseService: ServerSentEventsService,
	) {}

	@Get("")
	@ApiOperation({ summary: "List contracts, newest first" })
	@ApiQuery({ name: "ownerName", required: false })
	@ApiQuery({ name: "clientName", required: false })
	@ApiQuery({ name: "status", required: false, enum: CONTRACT_STATUS })
	@ApiQuery({
		name: "limit",
		required: false,
		description: "Max items to return (1-100)",
		schema: { type: "integer", minimum: 1, maximum: 100, example: 20 },
	})
	@ApiQuery({
		name: "cursor",
		required: false,
		description: "Opaque cursor from previous page",
		schema: { type: "string" },
	})
	@ApiOkResponse({
		description: "A page of contracts",
		schema: getSchemaPathForPaginatedDto(GetRentalContractDto),
	})
	async list(
		@Query("ownerName") ownerName: string | undefined,
		@Query("clientName") clientName: string | undefined,
		@Query("status", ParseContractStatusPipe) status: ContractStatus | undefined,
		@Query("limit", new DefaultValuePipe(20), ParseIntPipe) limit: number,
		@Query("cursor", ParseContractCursorPipe) cursor: Cursor,
	): Promise<ApiPaginatedEnvelope<GetRentalContractDto[]>> {
		const { items, nextCursor, total } = await this.service.list(
			{ ownerName, clientName, status },
			limit,
			cursor,
		);
		return paginatedEnvelope(items, { total, nextCursor });
	}

	@Sse("sse")
	@ApiOperation({ summary: "Subscribe to contract events" })
	sse(@Query("id") id?: string): Observable<SseEvent> {
		return this.sseService.contractEvents(id).pipe(
			map((event) => ({
				data: event,
			})),
		);
	}

	@Get(":contractId")
	@ApiOperation({ summary: "Get one contract" })
	@ApiOkResponse({
		description: "The contract",
		schema: getSchemaPathForDto(GetRentalContractDto),
	})
	@ApiNotFoundResponse({ description: "Contract not found" })
	async getOne(
		@Param("contractId") contractId: string,
	): Promise<ApiEnvelope<GetRentalContractDto>> {
		return envelope(await this.service.getOneByExternalId(contractId));
	}
}
