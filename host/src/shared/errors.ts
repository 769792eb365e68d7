export type ErrorCode =
	| "CONFIG_ERROR"
	| "DB_ERROR"
	| "BAD_REQUEST"
	| "NOT_FOUND"
	| "METHOD_NOT_ALLOWED"
	| "PAYLOAD_TOO_LARGE"
	| "INTERNAL_ERROR";

export class AppError extends Error {
	public readonly code: ErrorCode;
	public readonly status: number;
	public readonly retryable: boolean;
	public readonly details?: unknown;

	constructor(params: {
		code: ErrorCode;
		message: string;
		status: number;
		retryable?: boolean;
		details?: unknown;
		cause?: unknown;
	}) {
		super(params.message, params.cause !== undefined ? { cause: params.cause } : undefined);
		this.name = "AppError";
		this.code = params.code;
		this.status = params.status;
		this.retryable = params.retryable ?? false;
		this.details = params.details;
	}
}

export function asAppError(err: unknown): AppError {
	if (err instanceof AppError) {
		return err;
	}

	if (err instanceof Error) {
		return new AppError({
			code: "INTERNAL_ERROR",
			status: 500,
			message: err.message,
			cause: err
		});
	}

	return new AppError({
		code: "INTERNAL_ERROR",
		status: 500,
		message: "Unknown error",
		details: err
	});
}

export function configError(message: string, details?: unknown): AppError {
	return new AppError({
		code: "CONFIG_ERROR",
		status: 500,
		message,
		details
	});
}

/** Storage failures are transient from the producer's point of view. */
export function dbError(message: string, details?: unknown, cause?: unknown): AppError {
	return new AppError({
		code: "DB_ERROR",
		status: 503,
		retryable: true,
		message,
		details,
		cause
	});
}

export function badRequest(message: string, details?: unknown): AppError {
	return new AppError({
		code: "BAD_REQUEST",
		status: 400,
		message,
		details
	});
}

export function notFound(message = "Not found"): AppError {
	return new AppError({
		code: "NOT_FOUND",
		status: 404,
		message
	});
}

export function methodNotAllowed(message = "Method not allowed"): AppError {
	return new AppError({
		code: "METHOD_NOT_ALLOWED",
		status: 405,
		message
	});
}

export function payloadTooLarge(limit: number): AppError {
	return new AppError({
		code: "PAYLOAD_TOO_LARGE",
		status: 413,
		message: `Request body exceeds ${limit} bytes`
	});
}

export function toSafeErrorResponse(err: unknown): {
	status: number;
	body: { ok: false; error: string; code: ErrorCode; retryable?: true };
} {
	const e = asAppError(err);

	// Internal errors keep their message out of the response
	const message = e.code === "INTERNAL_ERROR" ? "Request failed" : e.message;

	return {
		status: e.status,
		body: {
			ok: false,
			error: message,
			code: e.code,
			...(e.retryable ? { retryable: true as const } : {})
		}
	};
}
