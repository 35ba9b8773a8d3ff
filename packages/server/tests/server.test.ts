import { mkdir, mkdtemp, rm, symlink, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import {
	type ChatStreamInput,
	createAbortError,
	type ModelEvent,
	type StreamingChatModel,
} from "@tollgate/core";
import { createRuntime, resolveRuntimeConfig, type Runtime } from "@tollgate/runtime";
import { describe, expect, test } from "vitest";
import { createApp } from "../src/app";

type Turn = ModelEvent[] | ((input: ChatStreamInput) => AsyncIterable<ModelEvent>);

class StubModel implements StreamingChatModel<string> {
	readonly provider = "stub";
	readonly model = "stub-model";
	private calls = 0;

	constructor(private readonly turns: Turn[]) {}

	async *stream(input: ChatStreamInput): AsyncGenerator<ModelEvent> {
		const turn = this.turns[Math.min(this.calls, this.turns.length - 1)];
		this.calls += 1;
		if (typeof turn === "function") {
			yield* turn(input);
			return;
		}
		yield* turn;
	}
}

const reply = (text: string): ModelEvent[] => [
	{ type: "text_delta", delta: text },
	{ type: "turn_complete", stop_reason: "stop" },
];

const bashTurn = (command: string): ModelEvent[] => [
	{
		type: "tool_call",
		call: {
			id: "call-1",
			type: "function",
			function: { name: "bash", arguments: JSON.stringify({ command }) },
		},
	},
	{ type: "tool_results_needed" },
	{ type: "turn_complete", stop_reason: "tool_calls" },
];

type Harness = {
	app: ReturnType<typeof createApp>;
	runtime: Runtime;
};

const withServer = async (
	turns: Turn[],
	run: (harness: Harness) => Promise<void>,
): Promise<void> => {
	const workspace = await mkdtemp(path.join(os.tmpdir(), "tollgate-server-"));
	const storageRoot = await mkdtemp(path.join(os.tmpdir(), "tollgate-server-home-"));
	try {
		const config = await resolveRuntimeConfig({
			workspaceRoot: workspace,
			storageRoot,
			env: {},
		});
		const runtime = await createRuntime(config, {
			model: new StubModel(turns),
			systemPrompt: "You are a test assistant.",
		});
		try {
			await run({ app: createApp(runtime), runtime });
		} finally {
			await runtime.close();
		}
	} finally {
		await rm(workspace, { recursive: true, force: true });
		await rm(storageRoot, { recursive: true, force: true });
	}
};

type SseMessage = { event: string; id: string; data: Record<string, unknown> };

const parseBlock = (block: string): SseMessage => {
	const message: SseMessage = { event: "message", id: "", data: {} };
	const dataLines: string[] = [];
	for (const line of block.split("\n")) {
		if (line.startsWith("event: ")) message.event = line.slice(7);
		else if (line.startsWith("id: ")) message.id = line.slice(4);
		else if (line.startsWith("data: ")) dataLines.push(line.slice(6));
	}
	message.data = JSON.parse(dataLines.join("\n"));
	return message;
};

/** Reads an SSE response to its end, handing each message to `onMessage` as it arrives. */
const readSse = async (
	response: Response,
	onMessage: (message: SseMessage) => Promise<void> | void = () => {},
): Promise<SseMessage[]> => {
	if (!response.body) throw new Error("response has no body");
	const reader = response.body.getReader();
	const decoder = new TextDecoder();
	const messages: SseMessage[] = [];
	let buffer = "";
	for (;;) {
		const { done, value } = await reader.read();
		if (done) break;
		buffer += decoder.decode(value, { stream: true });
		let boundary = buffer.indexOf("\n\n");
		while (boundary !== -1) {
			const block = buffer.slice(0, boundary);
			buffer = buffer.slice(boundary + 2);
			boundary = buffer.indexOf("\n\n");
			if (!block.trim()) continue;
			const message = parseBlock(block);
			if (message.event === "ping") continue;
			messages.push(message);
			await onMessage(message);
		}
	}
	return messages;
};

const postJson = (
	app: Harness["app"],
	url: string,
	body: unknown,
	method = "POST",
): Promise<Response> =>
	Promise.resolve(
		app.request(url, {
			method,
			headers: { "Content-Type": "application/json" },
			body: JSON.stringify(body),
		}),
	);

const sessionIdOf = (messages: SseMessage[]): string => {
	const session = messages.find((message) => message.event === "session");
	const id = session?.data.session_id;
	if (typeof id !== "string") throw new Error("no session event");
	return id;
};

describe("health", () => {
	test("reports the configured model", async () => {
		await withServer([reply("unused")], async ({ app }) => {
			const res = await app.request("/api/health");
			expect(res.status).toBe(200);
			expect(await res.json()).toEqual({
				ok: true,
				model: "local-model",
				active_exchanges: 0,
				pending_approvals: 0,
			});
		});
	});
});

describe("POST /api/chat", () => {
	test("rejects invalid bodies", async () => {
		await withServer([reply("unused")], async ({ app }) => {
			const empty = await postJson(app, "/api/chat", { message: "" });
			expect(empty.status).toBe(400);
			expect(await empty.json()).toMatchObject({ error: "Invalid input" });

			const malformed = await app.request("/api/chat", {
				method: "POST",
				headers: { "Content-Type": "application/json" },
				body: "{not json",
			});
			expect(malformed.status).toBe(400);
			expect(await malformed.json()).toEqual({
				error: "Invalid input",
				details: "body must be JSON",
			});
		});
	});

	test("streams exchange events with sequence ids", async () => {
		await withServer([reply("Hello there.")], async ({ app }) => {
			const res = await postJson(app, "/api/chat", { message: "hi" });
			expect(res.status).toBe(200);
			expect(res.headers.get("content-type")).toContain("text/event-stream");
			const messages = await readSse(res);

			expect(messages.map((message) => message.event)).toEqual([
				"exchange",
				"session",
				"content",
				"done",
			]);
			expect(messages.map((message) => message.id)).toEqual(["0", "1", "2", "3"]);
			expect(messages[2]?.data).toEqual({ type: "content", delta: "Hello there." });
			expect(messages[3]?.data).toMatchObject({ type: "done", status: "completed" });
		});
	});

	test("stores attachments as retrievable sources", async () => {
		await withServer([reply("Read it.")], async ({ app }) => {
			const messages = await readSse(
				await postJson(app, "/api/chat", {
					message: "summarise",
					attachments: [{ filename: "notes.txt", content: "alpha\nbeta" }],
				}),
			);
			const sources = messages.find((message) => message.event === "sources");
			const list = sources?.data.sources;
			if (!Array.isArray(list)) throw new Error("no sources event");
			expect(list).toHaveLength(1);
			expect(list[0]).toMatchObject({ title: "notes.txt", size: 10 });
			const id: unknown = list[0].id;

			const res = await app.request(`/api/sources/${String(id)}`);
			expect(res.status).toBe(200);
			expect(await res.json()).toEqual({ id, content: "alpha\nbeta" });

			expect((await app.request("/api/sources/abc")).status).toBe(400);
			expect((await app.request("/api/sources/9999")).status).toBe(404);
		});
	});

	test("cancels a running exchange by id", async () => {
		const waitingTurn = async function* (
			input: ChatStreamInput,
		): AsyncGenerator<ModelEvent> {
			yield { type: "text_delta", delta: "partial answer" };
			await new Promise<void>((resolve) => {
				if (input.signal?.aborted) resolve();
				input.signal?.addEventListener("abort", () => resolve(), { once: true });
			});
			throw createAbortError();
		};
		await withServer([waitingTurn], async ({ app }) => {
			let exchangeId = "";
			const cancelResponses: unknown[] = [];
			const messages = await readSse(
				await postJson(app, "/api/chat", { message: "long task" }),
				async (message) => {
					if (message.event === "exchange") {
						exchangeId = String(message.data.exchange_id);
					}
					if (message.event === "content") {
						const res = await app.request(`/api/chat/${exchangeId}/cancel`, {
							method: "POST",
						});
						cancelResponses.push(await res.json());
					}
				},
			);

			expect(cancelResponses).toEqual([{ ok: true }]);
			expect(messages.at(-1)?.data).toMatchObject({
				type: "done",
				status: "cancelled",
			});
			const after = await app.request(`/api/chat/${exchangeId}/cancel`, {
				method: "POST",
			});
			expect(await after.json()).toEqual({ ok: false });
		});
	});
});

describe("approvals", () => {
	test("a pending ticket is listed and resolved once over HTTP", async () => {
		await withServer([bashTurn("echo hi"), reply("Done.")], async ({ app }) => {
			let exchangeId = "";
			const checks: Record<string, unknown> = {};
			const messages = await readSse(
				await postJson(app, "/api/chat", { message: "say hi" }),
				async (message) => {
					if (message.event === "exchange") {
						exchangeId = String(message.data.exchange_id);
					}
					if (message.event !== "tool_approval_request") return;
					const ticketId = String(message.data.ticket_id);

					const listed = await app.request(
						`/api/approvals?exchange_id=${exchangeId}`,
					);
					const body: unknown = await listed.json();
					checks.listed = body;

					const first = await postJson(app, `/api/approvals/${ticketId}`, {
						decision: "approve",
					});
					checks.firstStatus = first.status;
					checks.first = await first.json();

					const second = await postJson(app, `/api/approvals/${ticketId}`, {
						decision: "reject",
					});
					checks.secondStatus = second.status;
					checks.second = await second.json();
				},
			);

			expect(checks.listed).toMatchObject({
				tickets: [
					{
						exchange_id: exchangeId,
						tool_call_id: "call-1",
						tool: "bash",
						description: "Run command: echo hi",
						state: "pending",
					},
				],
			});
			expect(checks.firstStatus).toBe(200);
			expect(checks.first).toMatchObject({
				ticket: { state: "approved" },
				remembered: [],
			});
			expect(checks.secondStatus).toBe(409);
			expect(checks.second).toMatchObject({
				error: "already_resolved",
				ticket: { state: "approved" },
			});

			const completed = messages.find(
				(message) => message.event === "tool_invocation_completed",
			);
			expect(completed?.data).toMatchObject({
				invocation: { tool_call_id: "call-1", status: "completed", result: "hi" },
			});
			expect(messages.at(-1)?.data).toMatchObject({
				type: "done",
				status: "completed",
			});
		});
	});

	test("validates decisions and unknown tickets", async () => {
		await withServer([reply("unused")], async ({ app }) => {
			const invalid = await postJson(app, "/api/approvals/ticket-x", {
				decision: "maybe",
			});
			expect(invalid.status).toBe(400);
			const missing = await postJson(app, "/api/approvals/ticket-x", {
				decision: "approve",
			});
			expect(missing.status).toBe(404);
			expect(await missing.json()).toEqual({ error: "Ticket not found" });
			expect((await app.request("/api/approvals/ticket-x")).status).toBe(404);
			expect(await (await app.request("/api/approvals")).json()).toEqual({
				tickets: [],
			});
		});
	});
});

describe("sessions", () => {
	test("lists, renames and deletes sessions", async () => {
		await withServer([reply("Hello.")], async ({ app }) => {
			const sessionId = sessionIdOf(
				await readSse(await postJson(app, "/api/chat", { message: "hi" })),
			);

			const listed = await app.request("/api/sessions");
			const list: unknown = await listed.json();
			expect(list).toMatchObject({ sessions: [{ id: sessionId }] });

			const snapshot = await app.request(`/api/sessions/${sessionId}`);
			expect(await snapshot.json()).toMatchObject({
				session: { id: sessionId },
				messages: [
					{ role: "user", content: "hi" },
					{ role: "assistant", content: "Hello." },
				],
			});

			const renamed = await postJson(
				app,
				`/api/sessions/${sessionId}`,
				{ title: "Greeting" },
				"PATCH",
			);
			expect(await renamed.json()).toMatchObject({
				session: { id: sessionId, title: "Greeting" },
			});
			const blank = await postJson(
				app,
				`/api/sessions/${sessionId}`,
				{ title: "  " },
				"PATCH",
			);
			expect(blank.status).toBe(400);
			const unknown = await postJson(
				app,
				"/api/sessions/missing",
				{ title: "Nope" },
				"PATCH",
			);
			expect(unknown.status).toBe(404);

			const deleted = await app.request(`/api/sessions/${sessionId}`, {
				method: "DELETE",
			});
			expect(await deleted.json()).toEqual({ ok: true });
			expect((await app.request(`/api/sessions/${sessionId}`)).status).toBe(404);
			expect(
				(await app.request(`/api/sessions/${sessionId}`, { method: "DELETE" }))
					.status,
			).toBe(404);
		});
	});
});

describe("GET /api/config", () => {
	test("serves effective settings without the API key", async () => {
		await withServer([reply("unused")], async ({ app, runtime }) => {
			const res = await app.request("/api/config");
			expect(res.status).toBe(200);
			const body = await res.json();
			expect(body).toMatchObject({
				workspace_root: runtime.config.workspaceRoot,
				model: {
					provider: "openai",
					name: "local-model",
					base_url: "http://127.0.0.1:1234/v1",
				},
				permissions: { version: 1, allow: [], deny: [] },
				security: { ignore_file: ".tollgateignore", extra_blocked_paths: [] },
				executors: {
					read_max_bytes: 5 * 1024 * 1024,
					search_max_results: 200,
					command_timeout_seconds: 10,
					command_timeout_max_seconds: 60,
				},
				server: { host: "127.0.0.1", port: 3000 },
			});
			expect(body).not.toHaveProperty("model.api_key");
		});
	});

	test("reflects remembered rules", async () => {
		await withServer([reply("unused")], async ({ app, runtime }) => {
			runtime.policy.remember(
				"allow",
				"bash",
				JSON.stringify({ command: "git status" }),
				"scope",
			);
			const res = await app.request("/api/config");
			expect(await res.json()).toMatchObject({
				permissions: { version: 2, allow: ["bash:git status"], deny: [] },
			});
		});
	});
});

describe("/api/workspace", () => {
	test("lists and serves workspace files", async () => {
		await withServer([reply("unused")], async ({ app, runtime }) => {
			const root = runtime.config.workspaceRoot;
			await mkdir(path.join(root, "src"));
			await writeFile(path.join(root, "src", "main.ts"), "export {};\n");
			await writeFile(path.join(root, "README.md"), "# Demo\n");

			const tree = await app.request("/api/workspace/files");
			expect(await tree.json()).toEqual({
				files: [
					{
						name: "src",
						path: "src",
						is_dir: true,
						children: [{ name: "main.ts", path: "src/main.ts", is_dir: false }],
					},
					{ name: "README.md", path: "README.md", is_dir: false },
				],
			});

			const file = await app.request("/api/workspace/files/src/main.ts");
			expect(file.status).toBe(200);
			expect(file.headers.get("content-type")).toContain("text/plain");
			expect(await file.text()).toBe("export {};\n");

			const missing = await app.request("/api/workspace/files/src/other.ts");
			expect(missing.status).toBe(404);
			expect(await missing.json()).toEqual({
				error: "not_found",
				message: "File not found: src/other.ts",
			});
			const directory = await app.request("/api/workspace/files/src");
			expect(directory.status).toBe(400);
		});
	});

	test("refuses files that resolve outside the workspace", async () => {
		const outside = await mkdtemp(path.join(os.tmpdir(), "tollgate-server-outside-"));
		try {
			await writeFile(path.join(outside, "notes.md"), "outside\n");
			await withServer([reply("unused")], async ({ app, runtime }) => {
				await symlink(
					path.join(outside, "notes.md"),
					path.join(runtime.config.workspaceRoot, "link.md"),
				);
				const res = await app.request("/api/workspace/files/link.md");
				expect(res.status).toBe(403);
				expect(await res.json()).toEqual({
					error: "forbidden",
					message:
						"I cannot access 'link.md' because it's outside the current project directory. I can only work with files inside the project folder.",
				});
			});
		} finally {
			await rm(outside, { recursive: true, force: true });
		}
	});
});
