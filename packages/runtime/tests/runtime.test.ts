import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, test } from "vitest";
import { resolveRuntimeConfig } from "../src/config";
import { createRuntime } from "../src/runtime";
import {
	callTurn,
	collect,
	invocationsOf,
	reply,
	ScriptedModel,
	toolCall,
} from "./helpers";

describe("createRuntime", () => {
	test("wires the gate, approvals and persisted rules end to end", async () => {
		const workspace = await mkdtemp(path.join(os.tmpdir(), "tollgate-runtime-"));
		const storageRoot = await mkdtemp(path.join(os.tmpdir(), "tollgate-home-"));
		try {
			await writeFile(path.join(workspace, ".tollgateignore"), ".env\n");
			await writeFile(path.join(workspace, ".env"), "TOKEN=placeholder\n");
			const config = await resolveRuntimeConfig({
				workspaceRoot: workspace,
				storageRoot,
				env: {},
			});
			const model = new ScriptedModel([
				callTurn(
					toolCall("call-1", "read", { path: ".env" }),
					toolCall("call-2", "bash", { command: "echo hi" }),
				),
				reply("All done."),
			]);
			const runtime = await createRuntime(config, {
				model,
				systemPrompt: "You are a test assistant.",
			});
			try {
				const decisions: Promise<unknown>[] = [];
				const events = await collect(
					runtime.orchestrator.run({ message: "check env" }),
					(event) => {
						if (event.type !== "tool_approval_request") return;
						decisions.push(
							runtime.resolveApproval({
								ticketId: event.ticket_id,
								decision: "approve",
								persist: "scope",
							}),
						);
					},
				);
				await Promise.all(decisions);

				expect(decisions).toHaveLength(1);
				expect(
					invocationsOf(events).map((record) => [record.status, record.result]),
				).toEqual([
					["blocked", null],
					["completed", "hi"],
				]);
				expect(
					runtime.policy.decide("bash", JSON.stringify({ command: "echo bye" }))
						.decision,
				).toBe("allow");
				expect(
					JSON.parse(await readFile(config.projectConfigPath, "utf8")),
				).toEqual({
					version: 1,
					permissions: { allow: [{ tool: "bash", command: "echo" }] },
				});
				expect(await runtime.store.listSessions()).toHaveLength(1);
			} finally {
				await runtime.close();
			}
		} finally {
			await rm(workspace, { recursive: true, force: true });
			await rm(storageRoot, { recursive: true, force: true });
		}
	});
});
