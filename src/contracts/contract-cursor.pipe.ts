import { BadRequestException, Injectable, PipeTransform } from "@nestjs/common";
import { Cursor, cursorFromString, emptyCursor } from "../common/dto/envelopes";

/** Reads the `cursor` query of the contract listing; absent means first page. */
@Injectable()
export class ParseContractCursorPipe
	implements PipeTransform<string | undefined, Cursor>
{
	transform(value: string | undefined): Cursor {
		if (value === undefined || value.trim() === "") {
			return emptyCursor;
		}
		const cursor = cursorFromString(value.trim());
		if (
			cursor.createdBefore === undefined ||
			cursor.idBefore === undefined ||
			cursor.idBefore < 1
		) {
			throw new BadRequestException({
				error: "InvalidCursor",
				details: "cursor must be a nextCursor returned by GET api/v1/contracts",
			});
		}
		return cursor;
	}
}
