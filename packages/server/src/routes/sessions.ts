import type { Runtime } from "@tollgate/runtime";
import { Hono } from "hono";
import { z } from "zod";
import { parseJsonBody } from "../http";

const renameInput = z.object({
	title: z.string().trim().min(1).max(200),
});

export const createSessionRoutes = (runtime: Runtime) => {
	const app = new Hono();

	// List all sessions, most recently updated first
	app.get("/", async (c) => {
		const sessions = await runtime.store.listSessions();
		return c.json({ sessions });
	});

	// Session with its ordered messages
	app.get("/:id", async (c) => {
		const snapshot = await runtime.store.loadSession(c.req.param("id"));
		if (!snapshot) {
			return c.json({ error: "Session not found" }, 404);
		}
		return c.json(snapshot);
	});

	app.patch("/:id", async (c) => {
		const parsed = await parseJsonBody(c, renameInput);
		if (!parsed.ok) return parsed.response;
		const session = await runtime.store.renameSession(
			c.req.param("id"),
			parsed.data.title,
		);
		if (!session) {
			return c.json({ error: "Session not found" }, 404);
		}
		return c.json({ session });
	});

	app.delete("/:id", async (c) => {
		const deleted = await runtime.store.deleteSession(c.req.param("id"));
		if (!deleted) {
			return c.json({ error: "Session not found" }, 404);
		}
		return c.json({ ok: true });
	});

	return app;
};
