import { BadRequestException, Injectable, PipeTransform } from "@nestjs/common";
import { CONTRACT_STATUS, ContractStatus, isContractStatus } from "./contract-lifecycle";

@Injectable()
export class ParseContractStatusPipe
	implements PipeTransform<string | undefined, ContractStatus | undefined>
{
	transform(value: string | undefined): ContractStatus | undefined {
		if (value === undefined || value === "") return undefined;
		if (!isContractStatus(value)) {
			throw new BadRequestException(
				`status must be one of ${CONTRACT_STATUS.join(", ")}`,
			);
		}
		return value;
	}
}
