import {
	ArgumentsHost,
	Catch,
	ExceptionFilter,
	HttpException,
	HttpStatus,
	Logger,
} from "@nestjs/common";
import type { Response } from "express";
import {
	ContractPipelineError,
	PipelineErrorCode,
	toError,
} from "../errors";

const STATUS_BY_CODE: Record<PipelineErrorCode, HttpStatus> = {
	FETCH_FAILED: HttpStatus.BAD_GATEWAY,
	GENERATION_FAILED: HttpStatus.BAD_GATEWAY,
	RENDER_FAILED: HttpStatus.UNPROCESSABLE_ENTITY,
	AUTH_FAILED: HttpStatus.BAD_GATEWAY,
	SUBMISSION_FAILED: HttpStatus.BAD_GATEWAY,
	SIGNING_URL_UNAVAILABLE: HttpStatus.SERVICE_UNAVAILABLE,
	MISSING_FIELDS: HttpStatus.BAD_REQUEST,
	INVALID_TERMS: HttpStatus.BAD_REQUEST,
};

export type PipelineErrorBody = {
	error: string;
	code: PipelineErrorCode;
	details: string;
	envelopeId?: string;
	contractId?: string;
	missing?: string[];
};

export function toPipelineErrorBody(
	err: ContractPipelineError,
): PipelineErrorBody {
	return {
		error: err.name,
		code: err.code,
		details: err.detail,
		...err.context,
	};
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
	private readonly logger = new Logger(HttpExceptionFilter.name);

	catch(exception: unknown, host: ArgumentsHost) {
		const res = host.switchToHttp().getResponse<Response>();

		if (exception instanceof ContractPipelineError) {
			const status = STATUS_BY_CODE[exception.code];
			this.logger.warn(`${exception.message} -> ${status}`);
			res.status(status).json(toPipelineErrorBody(exception));
			return;
		}

		if (exception instanceof HttpException) {
			const body = exception.getResponse();
			res
				.status(exception.getStatus())
				.json(typeof body === "string" ? { message: body } : body);
			return;
		}

		const error = toError(exception);
		this.logger.error(error.message, error.stack);
		res.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
			error: "Internal server error",
			details: error.message,
		});
	}
}
