import type { Runtime } from "@tollgate/runtime";
import { Hono } from "hono";
import { cors } from "hono/cors";
import { ActiveExchanges } from "./exchanges";
import { createApprovalRoutes } from "./routes/approvals";
import { createChatRoutes } from "./routes/chat";
import { createSessionRoutes } from "./routes/sessions";
import { createSourceRoutes } from "./routes/sources";
import { createWorkspaceRoutes } from "./routes/workspace";

export const createApp = (
	runtime: Runtime,
	exchanges: ActiveExchanges = new ActiveExchanges(),
) => {
	const app = new Hono();

	app.use("*", cors());

	app.route("/api/chat", createChatRoutes(runtime, exchanges));
	app.route("/api/approvals", createApprovalRoutes(runtime));
	app.route("/api/sessions", createSessionRoutes(runtime));
	app.route("/api/sources", createSourceRoutes(runtime));
	app.route("/api/workspace", createWorkspaceRoutes(runtime));

	app.get("/api/config", (c) => c.json(runtime.describeConfig()));

	// Health check
	app.get("/api/health", (c) =>
		c.json({
			ok: true,
			model: runtime.config.model.name,
			active_exchanges: exchanges.size,
			pending_approvals: runtime.coordinator.listPending().length,
		}),
	);

	return app;
};
