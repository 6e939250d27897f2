/**
 * Error taxonomy for the moderation engine.
 *
 * Store code throws these; the tracker and lifecycle services catch them at
 * their boundary and hand callers a {@link Result} instead.
 *
 * @module utils/errors
 */

import { type LogContext, StructuredLogger } from "./logger";

/** Failure reasons a public core operation can report. */
export type FailureReason =
	| "PersistenceConflict"
	| "NotFound"
	| "InvalidTransition"
	| "StoreUnavailable"
	| "AlreadyPending"
	| "AlreadyTerminal"
	| "TooEarly";

/** Typed outcome of every public core operation. */
export type Result<T, R extends FailureReason = FailureReason> =
	| { ok: true; value: T }
	| { ok: false; reason: R; message?: string };

export const ok = <T>(value: T): { ok: true; value: T } => ({
	ok: true,
	value,
});

export const fail = <R extends FailureReason>(
	reason: R,
	message?: string,
): { ok: false; reason: R; message?: string } => ({
	ok: false,
	reason,
	message,
});

export class ModerationError extends Error {
	readonly code: FailureReason | "ConfigError";

	constructor(code: FailureReason | "ConfigError", message: string) {
		super(message);
		this.name = new.target.name;
		this.code = code;
	}
}

/** A conditional update's precondition did not hold. */
export class PersistenceConflictError extends ModerationError {
	constructor(message: string) {
		super("PersistenceConflict", message);
	}
}

/** The referenced key has no record. */
export class NotFoundError extends ModerationError {
	constructor(message: string) {
		super("NotFound", message);
	}
}

/** The requested state change is not allowed from the current state. */
export class InvalidTransitionError extends ModerationError {
	constructor(message: string) {
		super("InvalidTransition", message);
	}
}

/** Durable storage could not be reached. */
export class StoreUnavailableError extends ModerationError {
	readonly cause: unknown;

	constructor(message: string, cause?: unknown) {
		super("StoreUnavailable", message);
		this.cause = cause;
	}
}

/** Environment configuration failed validation. */
export class ConfigError extends ModerationError {
	constructor(message: string) {
		super("ConfigError", message);
	}
}

/**
 * Converts a thrown value into a failed {@link Result}. Anything outside the
 * taxonomy is logged and reported as `StoreUnavailable`: the operation that
 * raised it fails, the process keeps running.
 */
export function toFailure(
	error: unknown,
	context: LogContext = {},
): { ok: false; reason: FailureReason; message?: string } {
	if (error instanceof ModerationError && error.code !== "ConfigError") {
		return fail(error.code, error.message);
	}
	StructuredLogger.logError(error, context);
	return fail(
		"StoreUnavailable",
		error instanceof Error ? error.message : String(error),
	);
}
