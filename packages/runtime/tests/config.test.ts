import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { ConfigError } from "@tollgate/config";
import { describe, expect, test } from "vitest";
import { resolveRuntimeConfig } from "../src/config";
import { DEFAULT_EXECUTOR_LIMITS } from "../src/sandbox/context";

const withDirs = async (
	run: (dirs: { workspace: string; storageRoot: string }) => Promise<void>,
): Promise<void> => {
	const workspace = await mkdtemp(path.join(os.tmpdir(), "tollgate-config-ws-"));
	const storageRoot = await mkdtemp(
		path.join(os.tmpdir(), "tollgate-config-home-"),
	);
	try {
		await run({ workspace, storageRoot });
	} finally {
		await rm(workspace, { recursive: true, force: true });
		await rm(storageRoot, { recursive: true, force: true });
	}
};

const writeJson = async (filePath: string, value: unknown): Promise<void> => {
	await mkdir(path.dirname(filePath), { recursive: true });
	await writeFile(filePath, JSON.stringify(value));
};

describe("resolveRuntimeConfig", () => {
	test("falls back to built-in defaults", async () => {
		await withDirs(async ({ workspace, storageRoot }) => {
			const config = await resolveRuntimeConfig({
				workspaceRoot: workspace,
				storageRoot,
				env: {},
			});
			expect(config.model).toEqual({
				provider: "openai",
				name: "local-model",
				baseUrl: "http://127.0.0.1:1234/v1",
				apiKey: "not-needed",
			});
			expect(config.server).toEqual({ host: "127.0.0.1", port: 3000 });
			expect(config.executors).toEqual(DEFAULT_EXECUTOR_LIMITS);
			expect(config.security).toEqual({
				ignoreFile: ".tollgateignore",
				extraBlockedPaths: [],
			});
			expect(config.permissions).toEqual({});
			expect(config.projectConfigPath).toBe(
				path.join(workspace, "tollgate.config.json"),
			);
			expect(config.globalConfigPath).toBe(path.join(storageRoot, "config.json"));
		});
	});

	test("layers project config over global config", async () => {
		await withDirs(async ({ workspace, storageRoot }) => {
			await writeJson(path.join(storageRoot, "config.json"), {
				version: 1,
				model: { name: "global-model", api_key: "test-key" },
				permissions: { allow: ["read"] },
			});
			await writeJson(path.join(workspace, "tollgate.config.json"), {
				version: 1,
				model: { name: "project-model" },
				permissions: { deny: ["bash:rm"] },
				executors: { command_timeout_seconds: 30 },
			});
			const config = await resolveRuntimeConfig({
				workspaceRoot: workspace,
				storageRoot,
				env: {},
			});
			expect(config.model.name).toBe("project-model");
			expect(config.model.apiKey).toBe("test-key");
			expect(config.permissions).toEqual({
				allow: [{ tool: "read" }],
				deny: [{ tool: "bash", command: "rm" }],
			});
			expect(config.executors.commandTimeoutSeconds).toBe(30);
			expect(config.executors.commandTimeoutMaxSeconds).toBe(60);
		});
	});

	test("environment variables take precedence", async () => {
		await withDirs(async ({ workspace, storageRoot }) => {
			await writeJson(path.join(workspace, "tollgate.config.json"), {
				version: 1,
				model: { name: "project-model", base_url: "http://localhost:9000/v1" },
				server: { port: 4000 },
			});
			const config = await resolveRuntimeConfig({
				workspaceRoot: workspace,
				storageRoot,
				env: {
					TOLLGATE_MODEL: "env-model",
					TOLLGATE_API_URL: "http://127.0.0.1:8081/v1",
					TOLLGATE_PORT: "8080",
					OPENAI_API_KEY: "test-openai-key",
				},
			});
			expect(config.model).toEqual({
				provider: "openai",
				name: "env-model",
				baseUrl: "http://127.0.0.1:8081/v1",
				apiKey: "test-openai-key",
			});
			expect(config.server.port).toBe(8080);
		});
	});

	test("rejects invalid ports and unsupported providers", async () => {
		await withDirs(async ({ workspace, storageRoot }) => {
			await expect(
				resolveRuntimeConfig({
					workspaceRoot: workspace,
					storageRoot,
					env: { TOLLGATE_PORT: "http" },
				}),
			).rejects.toThrow("TOLLGATE_PORT: invalid port http");

			await writeJson(path.join(workspace, "tollgate.config.json"), {
				version: 1,
				model: { provider: "acme" },
			});
			await expect(
				resolveRuntimeConfig({ workspaceRoot: workspace, storageRoot, env: {} }),
			).rejects.toBeInstanceOf(ConfigError);
		});
	});

	test("reports malformed config files", async () => {
		await withDirs(async ({ workspace, storageRoot }) => {
			await writeJson(path.join(workspace, "tollgate.config.json"), {
				version: 2,
			});
			await expect(
				resolveRuntimeConfig({ workspaceRoot: workspace, storageRoot, env: {} }),
			).rejects.toBeInstanceOf(ConfigError);
		});
	});
});
