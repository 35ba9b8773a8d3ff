import crypto from "node:crypto";
import { describeError, log } from "@tollgate/logger";
import type { Runtime } from "@tollgate/runtime";
import type { ExchangeEvent } from "@tollgate/shared-types";
import { Hono } from "hono";
import { streamSSE } from "hono/streaming";
import { z } from "zod";
import type { ActiveExchanges } from "../exchanges";
import { parseJsonBody } from "../http";

const chatInput = z.object({
	message: z.string().min(1),
	attachments: z
		.array(z.object({ filename: z.string().min(1), content: z.string() }))
		.optional(),
	session_id: z.string().min(1).optional(),
	model: z.string().min(1).optional(),
});

const HEARTBEAT_INTERVAL_MS = 5_000;

type SseStream = {
	writeSSE: (event: { event?: string; data: string; id?: string }) => Promise<void>;
};

const createSseSender = (stream: SseStream, exchangeId: string) => {
	let seq = 0;
	let closed = false;

	const sendEvent = async (type: string, data: unknown): Promise<boolean> => {
		if (closed) return false;
		try {
			await stream.writeSSE({
				event: type,
				data: JSON.stringify(data),
				id: String(seq++),
			});
			if (type === "done" || type === "error") {
				log(`[chat][${exchangeId}] emit event=${type} payload=${JSON.stringify(data)}`);
			}
			return true;
		} catch (error) {
			closed = true;
			log(`[chat][${exchangeId}] stream write failed: ${describeError(error)}`);
			return false;
		}
	};

	return { sendEvent, isClosed: () => closed };
};

export const createChatRoutes = (runtime: Runtime, exchanges: ActiveExchanges) => {
	const app = new Hono();

	app.post("/", async (c) => {
		const parsed = await parseJsonBody(c, chatInput);
		if (!parsed.ok) return parsed.response;
		const input = parsed.data;
		const exchangeId = crypto.randomUUID();
		const startedAt = Date.now();
		log(
			`[chat][${exchangeId}] start session=${input.session_id ?? "new"} message_chars=${input.message.length}`,
		);

		return streamSSE(c, async (stream) => {
			let eventCount = 0;
			let outcome = "running";
			const requestSignal = c.req.raw.signal;
			const controller = exchanges.register(exchangeId);
			const { sendEvent, isClosed } = createSseSender(stream, exchangeId);

			const heartbeat = setInterval(async () => {
				const ok = await sendEvent("ping", {});
				if (!ok) clearInterval(heartbeat);
			}, HEARTBEAT_INTERVAL_MS);

			const abortOnDisconnect = () => {
				log(`[chat][${exchangeId}] client disconnected`);
				exchanges.cancel(exchangeId, "client disconnected");
			};
			requestSignal.addEventListener("abort", abortOnDisconnect, { once: true });
			if (requestSignal.aborted) abortOnDisconnect();

			try {
				const events: AsyncIterable<ExchangeEvent> = runtime.orchestrator.run(
					{
						message: input.message,
						exchangeId,
						...(input.attachments ? { attachments: input.attachments } : {}),
						...(input.session_id ? { sessionId: input.session_id } : {}),
						...(input.model ? { model: input.model } : {}),
					},
					{ signal: controller.signal },
				);
				for await (const event of events) {
					eventCount += 1;
					if (event.type === "done") outcome = event.status;
					if (event.type === "error") outcome = `error:${event.kind}`;
					const sent = await sendEvent(event.type, event);
					if (!sent) {
						exchanges.cancel(exchangeId, "sse connection closed");
						outcome = "stream_closed";
					}
				}
			} catch (error) {
				outcome = "error";
				log(`[chat][${exchangeId}] run error: ${describeError(error)}`);
				if (!isClosed()) {
					await sendEvent("error", {
						type: "error",
						kind: "internal",
						message: describeError(error),
						message_id: null,
					});
				}
			} finally {
				clearInterval(heartbeat);
				requestSignal.removeEventListener("abort", abortOnDisconnect);
				exchanges.release(exchangeId);
				log(
					`[chat][${exchangeId}] finish outcome=${outcome} events=${eventCount} elapsed_ms=${Date.now() - startedAt}`,
				);
			}
		});
	});

	app.post("/:exchangeId/cancel", (c) => {
		const cancelled = exchanges.cancel(c.req.param("exchangeId"));
		return c.json({ ok: cancelled });
	});

	return app;
};
