export class ModelTransportError extends Error {
	readonly provider: string;

	constructor(provider: string, message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = "ModelTransportError";
		this.provider = provider;
	}
}
