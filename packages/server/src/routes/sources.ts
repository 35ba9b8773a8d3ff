import type { Runtime } from "@tollgate/runtime";
import { Hono } from "hono";

const parseSourceId = (value: string): number | null => {
	if (!/^\d+$/.test(value)) return null;
	const id = Number(value);
	return Number.isSafeInteger(id) ? id : null;
};

export const createSourceRoutes = (runtime: Runtime) => {
	const app = new Hono();

	app.get("/:id", async (c) => {
		const id = parseSourceId(c.req.param("id"));
		if (id === null) {
			return c.json({ error: "Invalid input", details: "source id must be an integer" }, 400);
		}
		const content = await runtime.store.readSourceContent(id);
		if (content === null) {
			return c.json({ error: "Source not found" }, 404);
		}
		return c.json({ id, content });
	});

	return app;
};
