import { log } from "@tollgate/logger";
import type { Runtime } from "@tollgate/runtime";
import { Hono } from "hono";
import { z } from "zod";
import { parseJsonBody } from "../http";

const decisionInput = z.object({
	decision: z.enum(["approve", "reject"]),
	persist: z.enum(["tool", "scope"]).optional(),
});

export const createApprovalRoutes = (runtime: Runtime) => {
	const app = new Hono();

	// Pending tickets, optionally for one exchange
	app.get("/", (c) => {
		const exchangeId = c.req.query("exchange_id");
		return c.json({ tickets: runtime.coordinator.listPending(exchangeId) });
	});

	app.get("/:ticketId", (c) => {
		const ticket = runtime.coordinator.get(c.req.param("ticketId"));
		if (!ticket) {
			return c.json({ error: "Ticket not found" }, 404);
		}
		return c.json({ ticket });
	});

	app.post("/:ticketId", async (c) => {
		const ticketId = c.req.param("ticketId");
		const parsed = await parseJsonBody(c, decisionInput);
		if (!parsed.ok) return parsed.response;
		const result = await runtime.resolveApproval({
			ticketId,
			decision: parsed.data.decision,
			...(parsed.data.persist ? { persist: parsed.data.persist } : {}),
		});
		if (!result.ok) {
			if (result.error === "not_found") {
				return c.json({ error: "Ticket not found" }, 404);
			}
			return c.json({ error: "already_resolved", ticket: result.ticket ?? null }, 409);
		}
		log(
			`[approvals][${ticketId}] ${result.ticket.state} tool=${result.ticket.tool}${result.remembered.length ? ` remembered=${result.remembered.join(",")}` : ""}`,
		);
		return c.json({ ticket: result.ticket, remembered: result.remembered });
	});

	return app;
};
