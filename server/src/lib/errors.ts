export type ErrorCode =
	| "CONFIG_ERROR"
	| "BAD_REQUEST"
	| "NOT_FOUND"
	| "DETECTION_FAILED"
	| "ANNOUNCEMENT_FAILED"
	| "INTERNAL_ERROR";

export class AppError extends Error {
	public readonly code: ErrorCode;
	public readonly status: number;
	public readonly details?: unknown;

	constructor(params: { code: ErrorCode; message: string; status: number; details?: unknown; cause?: unknown }) {
		super(params.message, params.cause !== undefined ? { cause: params.cause } : undefined);
		this.name = "AppError";
		this.code = params.code;
		this.status = params.status;
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

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

export function configError(message: string, details?: unknown): AppError {
	return new AppError({
		code: "CONFIG_ERROR",
		status: 500,
		message,
		details
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

export function detectionFailed(message: string, cause?: unknown): AppError {
	return new AppError({
		code: "DETECTION_FAILED",
		status: 502,
		message,
		cause
	});
}

export function announcementFailed(message: string, cause?: unknown): AppError {
	return new AppError({
		code: "ANNOUNCEMENT_FAILED",
		status: 500,
		message,
		cause
	});
}

export function toSafeErrorResponse(err: unknown): { status: number; body: { error: { code: ErrorCode; message: string } } } {
	const e = asAppError(err);

	// Internal failures never leak their message to HTTP clients
	if (e.status >= 500) {
		return {
			status: 500,
			body: { error: { code: "INTERNAL_ERROR", message: "Request failed" } }
		};
	}

	return {
		status: e.status,
		body: {
			error: {
				code: e.code,
				message: e.message
			}
		}
	};
}
