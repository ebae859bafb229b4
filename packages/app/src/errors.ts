/** The service rejected the stored credentials; the user has to log in again. */
export class AuthenticationError extends Error {
	constructor(
		message: string,
		readonly context?: Record<string, unknown>,
	) {
		super(message);
		this.name = "AuthenticationError";
	}
}

/** Any other collaborator failure. Shown on the status line; screen state is kept. */
export class ServiceError extends Error {
	constructor(
		message: string,
		readonly context?: Record<string, unknown>,
	) {
		super(message);
		this.name = "ServiceError";
	}
}
