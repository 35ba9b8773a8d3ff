export class StorageError extends Error {
	readonly action: string;

	constructor(action: string, message: string, options?: ErrorOptions) {
		super(`${action}: ${message}`, options);
		this.name = "StorageError";
		this.action = action;
	}
}
