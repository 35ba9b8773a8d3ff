export type DependencyKey<T> = {
	id: string;
	create: () => T | Promise<T>;
};

export type ToolContext = {
	signal?: AbortSignal;
	now?: () => Date;

	// DI
	deps: Record<string, unknown>;
	resolve: <T>(key: DependencyKey<T>) => Promise<T>;
};

/**
 * Keys are expected to hand out shared instances from `create`; the context
 * records the last resolved value under the key id.
 */
export const createToolContext = (
	options: { signal?: AbortSignal; now?: () => Date } = {},
): ToolContext => {
	const deps: Record<string, unknown> = {};
	const resolve = async <T>(key: DependencyKey<T>): Promise<T> => {
		const value = await key.create();
		deps[key.id] = value;
		return value;
	};
	return {
		...(options.signal ? { signal: options.signal } : {}),
		...(options.now ? { now: options.now } : {}),
		deps,
		resolve,
	};
};
