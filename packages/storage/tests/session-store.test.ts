import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, test } from "vitest";
import {
	deriveSessionTitle,
	hashContent,
	resolveStoragePaths,
	SqliteSessionStore,
	StorageError,
} from "../src";

const createClock = () => {
	let tick = 0;
	return () => new Date(Date.UTC(2026, 0, 1, 0, 0, tick++));
};

const withStore = async (
	run: (store: SqliteSessionStore) => Promise<void>,
): Promise<void> => {
	const root = await mkdtemp(path.join(os.tmpdir(), "tollgate-storage-"));
	const store = new SqliteSessionStore({
		paths: resolveStoragePaths({ rootOverride: root }),
		now: createClock(),
	});
	try {
		await run(store);
	} finally {
		await store.close();
		await rm(root, { recursive: true, force: true });
	}
};

describe("@tollgate/storage SqliteSessionStore", () => {
	test("round-trips a session with reasoning, tool invocations and sources", async () => {
		await withStore(async (store) => {
			const session = await store.createSession({ modelId: "local-model" });
			const user = await store.appendUserMessage(session.id, {
				content: "Summarise notes.md",
				attachments: [{ filename: "notes.md", content: "# Notes\n- one\n" }],
			});
			const assistant = await store.commitTurn(session.id, {
				content: "It has one bullet.",
				reasoning: "Read the file first.",
				toolInvocations: [
					{
						tool_call_id: "call_1",
						tool_name: "read",
						arguments: { path: "notes.md" },
						status: "completed",
						result: "    1  # Notes",
						error: null,
					},
					{
						tool_call_id: "call_2",
						tool_name: "bash",
						arguments: { command: "rm notes.md" },
						status: "denied",
						result: null,
						error: { kind: "permission_denied", message: "denied by policy (bash:rm)" },
					},
				],
				usage: {
					input_tokens: 120,
					output_tokens: 30,
					reasoning_tokens: 8,
					cache_tokens: 2,
				},
			});

			expect(user.ordinal).toBe(1);
			expect(assistant.ordinal).toBe(2);
			expect(user.sources).toEqual([
				{
					id: user.sources[0]?.id,
					title: "notes.md",
					content_hash: hashContent("# Notes\n- one\n"),
					size: 14,
				},
			]);

			const snapshot = await store.loadSession(session.id);
			expect(snapshot?.messages).toEqual([user, assistant]);
			expect(snapshot?.messages[1]?.tool_invocations.map((entry) => entry.tool_call_id)).toEqual([
				"call_1",
				"call_2",
			]);
			expect(snapshot?.session).toMatchObject({
				id: session.id,
				title: "Summarise notes.md",
				model_id: "local-model",
				input_tokens: 120,
				output_tokens: 30,
				reasoning_tokens: 8,
				cache_tokens: 2,
				total_tokens: 160,
			});
		});
	});

	test("keeps one blob per content hash and reclaims it at zero references", async () => {
		await withStore(async (store) => {
			const session = await store.createSession();
			const content = "shared attachment body";
			const hash = hashContent(content);
			const first = await store.appendUserMessage(session.id, {
				content: "first",
				attachments: [{ filename: "a.txt", content }],
			});
			const second = await store.appendUserMessage(session.id, {
				content: "second",
				attachments: [{ filename: "b.txt", content }],
			});

			expect((await store.getBlob(hash))?.ref_count).toBe(2);

			const firstSource = first.sources[0];
			const secondSource = second.sources[0];
			if (!firstSource || !secondSource) throw new Error("missing sources");

			await expect(store.removeSource(firstSource.id)).resolves.toEqual({
				removed: true,
				reclaimed: false,
			});
			expect((await store.getBlob(hash))?.ref_count).toBe(1);
			await expect(store.readSourceContent(secondSource.id)).resolves.toBe(content);

			await expect(store.removeSource(secondSource.id)).resolves.toEqual({
				removed: true,
				reclaimed: true,
			});
			await expect(store.getBlob(hash)).resolves.toBeNull();
			await expect(store.removeSource(secondSource.id)).resolves.toEqual({
				removed: false,
				reclaimed: false,
			});
		});
	});

	test("releases blob references when a session is deleted", async () => {
		await withStore(async (store) => {
			const kept = await store.createSession();
			const dropped = await store.createSession();
			const content = "same bytes";
			await store.appendUserMessage(kept.id, {
				content: "keep",
				attachments: [{ filename: "x.txt", content }],
			});
			await store.appendUserMessage(dropped.id, {
				content: "drop",
				attachments: [{ filename: "y.txt", content }],
			});

			await expect(store.deleteSession(dropped.id)).resolves.toBe(true);
			expect((await store.getBlob(hashContent(content)))?.ref_count).toBe(1);
			await expect(store.loadSession(dropped.id)).resolves.toBeNull();
			await expect(store.deleteSession(dropped.id)).resolves.toBe(false);
			expect((await store.listSessions()).map((entry) => entry.id)).toEqual([kept.id]);
		});
	});

	test("renames sessions and rejects writes to unknown sessions", async () => {
		await withStore(async (store) => {
			const session = await store.createSession();
			const renamed = await store.renameSession(session.id, "Release prep");
			expect(renamed?.title).toBe("Release prep");
			await expect(store.renameSession("missing", "x")).resolves.toBeNull();

			const failure = await store
				.commitTurn("missing", {
					content: "",
					reasoning: null,
					toolInvocations: [],
					usage: {
						input_tokens: 0,
						output_tokens: 0,
						reasoning_tokens: 0,
						cache_tokens: 0,
					},
				})
				.catch((error: unknown) => error);
			expect(failure).toBeInstanceOf(StorageError);
			expect(failure instanceof StorageError && failure.action).toBe("commit_turn");
		});
	});

	test("leaves committed state untouched when a turn write fails", async () => {
		await withStore(async (store) => {
			const session = await store.createSession();
			await store.appendUserMessage(session.id, { content: "hello" });
			const before = await store.loadSession(session.id);

			await expect(
				store.commitTurn(session.id, {
					content: "partial",
					reasoning: null,
					toolInvocations: [
						{
							tool_call_id: "",
							tool_name: "read",
							arguments: {},
							status: "completed",
							result: "ok",
							error: null,
						},
					],
					attachments: [{ filename: "z.txt", content: "zzz" }],
					usage: {
						input_tokens: 5,
						output_tokens: 0,
						reasoning_tokens: 0,
						cache_tokens: 0,
					},
				}),
			).rejects.toBeInstanceOf(StorageError);

			await expect(store.loadSession(session.id)).resolves.toEqual(before);
			await expect(store.getBlob(hashContent("zzz"))).resolves.toBeNull();
		});
	});

	test("derives titles from the first user message", () => {
		expect(deriveSessionTitle("  hi  ")).toBe("hi");
		expect(deriveSessionTitle("   ")).toBeNull();
		const long = "x".repeat(120);
		expect(deriveSessionTitle(long)).toBe(`${"x".repeat(97)}...`);
	});
});
