import type { Context } from "hono";
import { type ZodType, z } from "zod";

export type ParsedBody<T> =
	| { ok: true; data: T }
	| { ok: false; response: Response };

/** Reads a JSON body and validates it; failures become a 400 response. */
export const parseJsonBody = async <T>(
	c: Context,
	schema: ZodType<T>,
): Promise<ParsedBody<T>> => {
	let body: unknown;
	try {
		body = await c.req.json();
	} catch {
		return {
			ok: false,
			response: c.json({ error: "Invalid input", details: "body must be JSON" }, 400),
		};
	}
	const parsed = schema.safeParse(body);
	if (!parsed.success) {
		return {
			ok: false,
			response: c.json(
				{ error: "Invalid input", details: z.prettifyError(parsed.error) },
				400,
			),
		};
	}
	return { ok: true, data: parsed.data };
};
