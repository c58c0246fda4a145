export class DashmeterError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'DashmeterError';
	}
}

export class SessionError extends DashmeterError {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'SessionError';
	}
}

export class LaunchFailedError extends SessionError {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'LaunchFailedError';
	}
}

export class NavigationFailedError extends SessionError {
	constructor(
		message: string,
		public readonly url: string,
		options?: ErrorOptions,
	) {
		super(message, options);
		this.name = 'NavigationFailedError';
	}
}

export class SessionClosedError extends SessionError {
	constructor(message = 'Browser session is not open', options?: ErrorOptions) {
		super(message, options);
		this.name = 'SessionClosedError';
	}
}

/**
 * The page shell itself is missing, so there is nothing to extract from.
 */
export class MarkupStructureError extends DashmeterError {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'MarkupStructureError';
	}
}

export class TimeoutError extends DashmeterError {
	public readonly timeoutMs: number;

	constructor(operation: string, timeoutMs: number, options?: ErrorOptions) {
		super(`Operation "${operation}" timed out after ${timeoutMs}ms`, options);
		this.name = 'TimeoutError';
		this.timeoutMs = timeoutMs;
	}
}

export class SchemaViolationError extends DashmeterError {
	public readonly field: string;
	public readonly issues: string[];

	constructor(field: string, issues: string[], options?: ErrorOptions) {
		super(`Validation failed for "${field}": ${issues.join('; ')}`, options);
		this.name = 'SchemaViolationError';
		this.field = field;
		this.issues = issues;
	}
}

export class ConfigError extends SchemaViolationError {
	constructor(field: string, issues: string[], options?: ErrorOptions) {
		super(field, issues, options);
		this.name = 'ConfigError';
	}
}

/**
 * A caller broke a contract: an unknown state field, a command after stop.
 */
export class ProgrammingError extends DashmeterError {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'ProgrammingError';
	}
}
