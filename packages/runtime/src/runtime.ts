import {
	ChatOpenAI,
	loadSystemPrompt,
	type SessionStore,
	type StreamingChatModel,
} from "@tollgate/core";
import { debugLog, describeError } from "@tollgate/logger";
import { ensureStorageDirs, SqliteSessionStore } from "@tollgate/storage";
import { ApprovalCoordinator } from "./approvals/coordinator";
import {
	type ResolveApprovalInput,
	type ResolveApprovalResult,
	resolveApproval,
} from "./approvals/resolve";
import { type PublicConfig, type RuntimeConfig, toPublicConfig } from "./config";
import { ExchangeOrchestrator } from "./exchange/orchestrator";
import { PermissionPolicy } from "./permissions/service";
import { SandboxContext } from "./sandbox/context";
import { loadIgnoreFile } from "./security/ignore";
import { WorkspaceFiles } from "./workspace/files";

export type Runtime = {
	config: RuntimeConfig;
	store: SessionStore;
	policy: PermissionPolicy;
	coordinator: ApprovalCoordinator;
	orchestrator: ExchangeOrchestrator;
	workspace: WorkspaceFiles;
	describeConfig: () => PublicConfig;
	resolveApproval: (input: ResolveApprovalInput) => Promise<ResolveApprovalResult>;
	close: () => Promise<void>;
};

export type CreateRuntimeOptions = {
	model?: StreamingChatModel<string>;
	store?: SessionStore;
	systemPrompt?: string;
	maxIterations?: number;
};

export const createRuntime = async (
	config: RuntimeConfig,
	options: CreateRuntimeOptions = {},
): Promise<Runtime> => {
	let store = options.store;
	if (!store) {
		await ensureStorageDirs(config.storage);
		store = new SqliteSessionStore({
			paths: config.storage,
			onError: (error, context) => {
				debugLog(
					`storage ${context.action} target=${context.detail ?? "-"} error=${describeError(error)}`,
				);
			},
		});
	}
	const ignore = await loadIgnoreFile(
		config.workspaceRoot,
		config.security.ignoreFile,
	);
	const sandbox = await SandboxContext.create({
		rootDir: config.workspaceRoot,
		ignore,
		limits: config.executors,
	});
	const policy = new PermissionPolicy(config.permissions);
	const coordinator = new ApprovalCoordinator();
	const model =
		options.model ??
		new ChatOpenAI({
			model: config.model.name,
			clientOptions: {
				baseURL: config.model.baseUrl,
				apiKey: config.model.apiKey,
			},
		});
	const systemPrompt =
		options.systemPrompt ?? (await loadSystemPrompt(sandbox.rootDir));
	const gate = {
		ignoreFileName: config.security.ignoreFile,
		extraBlockedPaths: config.security.extraBlockedPaths,
	};
	const orchestrator = new ExchangeOrchestrator({
		model,
		store,
		policy,
		coordinator,
		sandbox,
		systemPrompt,
		gate,
		...(options.maxIterations ? { maxIterations: options.maxIterations } : {}),
	});
	debugLog(
		`runtime ready workspace=${sandbox.rootDir} model=${model.model} rules=${policy.current().allow.length}/${policy.current().deny.length}`,
	);
	const runtimeStore = store;
	return {
		config,
		store: runtimeStore,
		policy,
		coordinator,
		orchestrator,
		workspace: new WorkspaceFiles(sandbox, gate),
		describeConfig: () => toPublicConfig(config, policy.current()),
		resolveApproval: (input) =>
			resolveApproval(
				{ coordinator, policy, configPath: config.projectConfigPath },
				input,
			),
		close: async () => {
			coordinator.dispose();
			await runtimeStore.close();
		},
	};
};
