export const createAbortError = (): Error => {
	const error = new Error("Operation aborted");
	error.name = "AbortError";
	return error;
};

export const isAbortError = (error: unknown): boolean =>
	error instanceof Error &&
	(error.name === "AbortError" ||
		error.name === "APIUserAbortError" ||
		error.name === "AbortSignal");

export const throwIfAborted = (signal?: AbortSignal): void => {
	if (signal?.aborted) {
		throw createAbortError();
	}
};
