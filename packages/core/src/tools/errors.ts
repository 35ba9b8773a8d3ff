export type ToolErrorKind =
	| "invalid_input"
	| "not_found"
	| "timeout"
	| "exit_code"
	| "io"
	| "too_large"
	| "cancelled";

export class ToolExecutionError extends Error {
	readonly kind: ToolErrorKind;

	constructor(kind: ToolErrorKind, message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = "ToolExecutionError";
		this.kind = kind;
	}
}

export const isToolExecutionError = (
	error: unknown,
): error is ToolExecutionError => error instanceof ToolExecutionError;
