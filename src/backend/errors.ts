/**
 * Error taxonomy shared by the store, the persona services and the HTTP layer.
 * Each error carries the HTTP status it maps to at the request boundary.
 */
export class ChatBackendError extends Error {
	readonly status: number;

	constructor(message: string, status: number, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
		this.status = status;
	}
}

export class ConfigurationError extends ChatBackendError {
	constructor(message: string) {
		super(message, 500);
	}
}

export class StorageUnavailableError extends ChatBackendError {
	constructor(operation: string, cause: unknown) {
		super(`Storage unavailable during ${operation}`, 503, { cause });
	}
}

export class UpstreamAssistantError extends ChatBackendError {
	constructor(persona: string, cause: unknown) {
		super(`Assistant "${persona}" failed to respond`, 502, { cause });
	}
}

export class SessionNotFoundError extends ChatBackendError {
	readonly sessionId: string;

	constructor(sessionId: string) {
		super('session not found', 404);
		this.sessionId = sessionId;
	}
}

export class AuthError extends ChatBackendError {
	constructor(message = 'Unauthorized') {
		super(message, 401);
	}
}

export class RequestValidationError extends ChatBackendError {
	constructor(message: string) {
		super(message, 400);
	}
}

export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
