// Shared helpers for the express endpoints.
//
// Handlers stay focused on: call the orchestrator -> shape the response.
// Errors thrown by a handler all go through one mapping to { error: { code, message } }.

import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from "express";
import type winston from "winston";

import { badRequest, toSafeErrorResponse } from "../lib/errors";

export type EndpointArgs = {
	req: Request;
	res: Response;
	log: winston.Logger;
};

/** Returns the JSON body to send with 200, or undefined when the handler wrote the response itself. */
export type EndpointHandler = (args: EndpointArgs) => Promise<unknown>;

function describeError(err: unknown): { name: string; message: string; stack?: string } {
	const e = err instanceof Error ? err : new Error(String(err));
	return { name: e.name, message: e.message, stack: e.stack };
}

/** Body-parser marks malformed JSON bodies with this type. */
function isBodyParseError(err: unknown): boolean {
	return typeof err === "object" && err !== null && "type" in err && err.type === "entity.parse.failed";
}

function sendError(res: Response, log: winston.Logger, name: string, err: unknown): void {
	const mapped = toSafeErrorResponse(err);
	if (mapped.status >= 500) {
		const d = describeError(err);
		log.error(`${name}: unhandled error: %s`, d.stack ?? d.message);
	} else {
		log.info(`${name}: ${mapped.body.error.code} ${mapped.body.error.message}`);
	}
	res.status(mapped.status).json(mapped.body);
}

/**
 * Wrap a handler with standard concerns:
 * - logger
 * - async error capture
 * - consistent error -> response mapping
 */
export function httpEndpoint(log: winston.Logger, name: string, handler: EndpointHandler): RequestHandler {
	return (req: Request, res: Response) => {
		handler({ req, res, log })
			.then(body => {
				if (body !== undefined && !res.headersSent) {
					res.status(200).json(body);
				}
			})
			.catch(err => {
				if (res.headersSent) {
					log.error(`${name}: failed after response was sent: %s`, describeError(err).message);
					return;
				}
				sendError(res, log, name, err);
			});
	};
}

/** Last middleware: errors raised before a handler ran (e.g. invalid JSON bodies). */
export function errorHandler(log: winston.Logger): ErrorRequestHandler {
	return (err: unknown, _req: Request, res: Response, next: NextFunction) => {
		if (res.headersSent) {
			next(err);
			return;
		}
		sendError(res, log, "http", isBodyParseError(err) ? badRequest("Request body is not valid JSON") : err);
	};
}
