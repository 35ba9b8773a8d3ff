import type { Runtime, WorkspaceReadError } from "@tollgate/runtime";
import { Hono } from "hono";

const STATUS: Record<WorkspaceReadError, 400 | 403 | 404 | 413> = {
	forbidden: 403,
	not_found: 404,
	not_a_file: 400,
	unsupported: 400,
	too_large: 413,
};

export const createWorkspaceRoutes = (runtime: Runtime) => {
	const app = new Hono();

	app.get("/files", async (c) => c.json({ files: await runtime.workspace.tree() }));

	app.get("/files/:path{.+}", async (c) => {
		const result = await runtime.workspace.read(c.req.param("path"));
		if (!result.ok) {
			return c.json({ error: result.error, message: result.message }, STATUS[result.error]);
		}
		return c.text(result.content);
	});

	return app;
};
