import crypto from "node:crypto";
import {
	type BaseMessage,
	createToolContext,
	isAbortError,
	isToolExecutionError,
	ReasoningScanner,
	type ScanOutput,
	type SessionStore,
	type StreamingChatModel,
	type Tool,
	type ToolCall,
	ToolExecutionError,
	type ToolResult,
} from "@tollgate/core";
import { debugLog, describeError, log } from "@tollgate/logger";
import {
	addTokenUsage,
	type Attachment,
	type DoneStatus,
	emptyTokenUsage,
	type ExchangeEvent,
	type JsonValue,
	type MessageRecord,
	type TokenUsage,
	type ToolApprovalRequestEvent,
	type ToolInvocationRecord,
} from "@tollgate/shared-types";
import type {
	ApprovalCoordinator,
	ApprovalOutcome,
} from "../approvals/coordinator";
import type { PermissionPolicy } from "../permissions/service";
import { createSandboxKey, type SandboxContext } from "../sandbox/context";
import type { PathGateOptions } from "../security/path-gate";
import { type GateOutcome, gateToolCall } from "../security/tool-gate";
import { createTools } from "../tools";
import { ToolRegistry } from "../tools/registry";
import {
	completedInvocation,
	failedInvocation,
	parseArgumentsValue,
	toolMessageContent,
	toolResultText,
} from "./invocation";
import { buildHistoryMessages, formatUserPrompt } from "./prompt";

export const DEFAULT_MAX_ITERATIONS = 20;

export type ExchangeRequest = {
	message: string;
	attachments?: Attachment[];
	sessionId?: string;
	/** Per-request model override. */
	model?: string;
	exchangeId?: string;
};

export type ExchangeRunOptions = {
	signal?: AbortSignal;
};

export type ExchangeOrchestratorOptions = {
	model: StreamingChatModel<string>;
	store: SessionStore;
	policy: PermissionPolicy;
	coordinator: ApprovalCoordinator;
	sandbox: SandboxContext;
	tools?: Tool[];
	systemPrompt?: string;
	maxIterations?: number;
	gate?: Pick<PathGateOptions, "ignoreFileName" | "extraBlockedPaths">;
	createId?: () => string;
};

type CallStage =
	| { kind: "duplicate" }
	| { kind: "unknown" }
	| { kind: "blocked"; message: string }
	| { kind: "denied"; reason: string }
	| { kind: "allowed" }
	| { kind: "ticket"; ticketId: string; decision: Promise<ApprovalOutcome> };

type PreparedCall = {
	call: ToolCall;
	args: JsonValue;
	stage: CallStage;
};

type ExchangeState = {
	exchangeId: string;
	seenCallIds: Set<string>;
	invocations: ToolInvocationRecord[];
	contents: string[];
	reasonings: string[];
	usage: TokenUsage;
};

type TurnResult = {
	calls: PreparedCall[];
	text: string;
	error: Error | null;
	aborted: boolean;
};

function* scanEvents(output: ScanOutput): Generator<ExchangeEvent> {
	if (output.reasoning) yield { type: "reasoning", delta: output.reasoning };
	if (output.content) yield { type: "content", delta: output.content };
}

const invocationBase = ({ call, args }: PreparedCall) => ({
	tool_call_id: call.id,
	tool_name: call.function.name,
	arguments: args,
});

const storageFailure = (error: unknown): ExchangeEvent => {
	log(`storage failure: ${describeError(error)}`);
	return {
		type: "error",
		kind: "storage",
		message: describeError(error),
		message_id: null,
	};
};

/**
 * Drives one user message through model turns until the model stops asking
 * for tools. Every tool call passes gate → policy → approval → gate again →
 * execution, and results re-enter the context in the order they were
 * requested.
 */
export class ExchangeOrchestrator {
	private readonly model: StreamingChatModel<string>;
	private readonly store: SessionStore;
	private readonly policy: PermissionPolicy;
	private readonly coordinator: ApprovalCoordinator;
	private readonly sandbox: SandboxContext;
	private readonly registry: ToolRegistry;
	private readonly systemPrompt?: string;
	private readonly maxIterations: number;
	private readonly gateOptions: PathGateOptions;
	private readonly createId: () => string;

	constructor(options: ExchangeOrchestratorOptions) {
		this.model = options.model;
		this.store = options.store;
		this.policy = options.policy;
		this.coordinator = options.coordinator;
		this.sandbox = options.sandbox;
		this.registry = new ToolRegistry(
			options.tools ?? createTools(createSandboxKey(options.sandbox)),
		);
		this.systemPrompt = options.systemPrompt;
		this.maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
		this.gateOptions = { ...options.gate, ignore: options.sandbox.ignore };
		this.createId = options.createId ?? (() => crypto.randomUUID());
	}

	async *run(
		request: ExchangeRequest,
		options: ExchangeRunOptions = {},
	): AsyncGenerator<ExchangeEvent> {
		const exchangeId = request.exchangeId ?? this.createId();
		const controller = new AbortController();
		const external = options.signal;
		const onAbort = (): void => {
			debugLog(`exchange ${exchangeId} cancelled`);
			controller.abort();
			this.coordinator.supersedeExchange(exchangeId);
		};
		if (external?.aborted) {
			onAbort();
		} else {
			external?.addEventListener("abort", onAbort, { once: true });
		}
		yield { type: "exchange", exchange_id: exchangeId };
		try {
			yield* this.runExchange(request, exchangeId, controller.signal);
		} finally {
			external?.removeEventListener("abort", onAbort);
			this.coordinator.supersedeExchange(exchangeId);
		}
	}

	private async *runExchange(
		request: ExchangeRequest,
		exchangeId: string,
		signal: AbortSignal,
	): AsyncGenerator<ExchangeEvent> {
		const modelId = request.model ?? this.model.model;
		let sessionId: string;
		let history: BaseMessage[] = [];
		let userRecord: MessageRecord;
		try {
			if (request.sessionId) {
				const snapshot = await this.store.loadSession(request.sessionId);
				if (!snapshot) {
					yield {
						type: "error",
						kind: "internal",
						message: `Session not found: ${request.sessionId}`,
						message_id: null,
					};
					return;
				}
				sessionId = snapshot.session.id;
				history = await buildHistoryMessages(snapshot, this.store);
				yield { type: "session", session_id: sessionId, created: false };
			} else {
				const session = await this.store.createSession({ modelId });
				sessionId = session.id;
				yield { type: "session", session_id: sessionId, created: true };
			}
			userRecord = await this.store.appendUserMessage(sessionId, {
				content: request.message,
				...(request.attachments ? { attachments: request.attachments } : {}),
			});
		} catch (error) {
			yield storageFailure(error);
			return;
		}
		if (userRecord.sources.length) {
			yield { type: "sources", sources: userRecord.sources };
		}

		const messages: BaseMessage[] = [
			...(this.systemPrompt
				? [{ role: "system" as const, content: this.systemPrompt }]
				: []),
			...history,
			{
				role: "user",
				content: formatUserPrompt(request.message, request.attachments),
			},
		];
		const state: ExchangeState = {
			exchangeId,
			seenCallIds: new Set(),
			invocations: [],
			contents: [],
			reasonings: [],
			usage: emptyTokenUsage(),
		};

		let status: DoneStatus = "max_iterations";
		let transportError: Error | null = null;
		for (let iteration = 0; iteration < this.maxIterations; iteration += 1) {
			if (signal.aborted) {
				status = "cancelled";
				break;
			}
			const turn = yield* this.streamTurn(messages, modelId, state, signal);
			if (turn.error) {
				transportError = turn.error;
				this.coordinator.supersedeExchange(exchangeId);
				for (const prepared of turn.calls) {
					const record = await this.abandonCall(prepared);
					state.invocations.push(record);
					yield { type: "tool_invocation_completed", invocation: record };
				}
				break;
			}
			if (turn.calls.length) {
				messages.push({
					role: "assistant",
					content: turn.text || null,
					tool_calls: turn.calls.map((prepared) => prepared.call),
				});
				for (const prepared of turn.calls) {
					const record = await this.settleCall(prepared, signal);
					if (!record) continue;
					state.invocations.push(record);
					messages.push({
						role: "tool",
						tool_call_id: record.tool_call_id,
						tool_name: record.tool_name,
						content: toolMessageContent(record),
						is_error: record.status !== "completed",
					});
					yield { type: "tool_invocation_completed", invocation: record };
				}
			}
			if (turn.aborted || signal.aborted) {
				status = "cancelled";
				break;
			}
			if (!turn.calls.length) {
				status = "completed";
				break;
			}
		}

		let committed: MessageRecord;
		try {
			committed = await this.store.commitTurn(sessionId, {
				content: state.contents.join("\n\n"),
				reasoning: state.reasonings.length
					? state.reasonings.join("\n\n")
					: null,
				toolInvocations: state.invocations,
				usage: state.usage,
				modelId,
			});
		} catch (error) {
			yield storageFailure(error);
			return;
		}

		if (transportError) {
			log(`[chat][${exchangeId}] model stream failed: ${transportError.message}`);
			yield {
				type: "error",
				kind: "transport",
				message: transportError.message,
				message_id: committed.id,
			};
			return;
		}
		yield { type: "done", status, message_id: committed.id };
	}

	private async *streamTurn(
		messages: BaseMessage[],
		modelId: string,
		state: ExchangeState,
		signal: AbortSignal,
	): AsyncGenerator<ExchangeEvent, TurnResult> {
		const scanner = new ReasoningScanner();
		const calls: PreparedCall[] = [];
		let text = "";
		let error: Error | null = null;
		let aborted = false;
		try {
			for await (const event of this.model.stream({
				messages: [...messages],
				model: modelId,
				tools: this.registry.definitions(),
				signal,
			})) {
				if (signal.aborted) {
					aborted = true;
					break;
				}
				if (event.type === "text_delta") {
					const output = scanner.push(event.delta);
					text += output.content;
					yield* scanEvents(output);
				} else if (event.type === "tool_call") {
					const { prepared, approval } = this.prepareCall(event.call, state);
					calls.push(prepared);
					if (approval) yield approval;
				} else if (event.type === "usage") {
					state.usage = addTokenUsage(state.usage, event.usage);
					yield { type: "usage", usage: state.usage };
				} else if (event.type === "error") {
					error = event.error;
					break;
				}
			}
		} catch (caught) {
			if (isAbortError(caught) || signal.aborted) {
				aborted = true;
			} else {
				error = caught instanceof Error ? caught : new Error(String(caught));
			}
		}
		if (signal.aborted) aborted = true;

		const rest = scanner.finish();
		text += rest.content;
		yield* scanEvents(rest);
		if (text) state.contents.push(text);
		if (scanner.reasoning) state.reasonings.push(scanner.reasoning);
		return { calls, text, error, aborted };
	}

	private gate(toolName: string, rawArgs: string): GateOutcome {
		return gateToolCall(
			toolName,
			rawArgs,
			this.sandbox.rootDir,
			this.gateOptions,
		);
	}

	private prepareCall(
		call: ToolCall,
		state: ExchangeState,
	): { prepared: PreparedCall; approval?: ToolApprovalRequestEvent } {
		const toolName = call.function.name;
		const rawArgs = call.function.arguments;
		const args = parseArgumentsValue(rawArgs);
		const prepare = (stage: CallStage): PreparedCall => ({ call, args, stage });

		if (state.seenCallIds.has(call.id)) {
			return { prepared: prepare({ kind: "duplicate" }) };
		}
		state.seenCallIds.add(call.id);

		const gate = this.gate(toolName, rawArgs);
		if (!gate.allowed) {
			return { prepared: prepare({ kind: "blocked", message: gate.message }) };
		}
		if (!this.registry.has(toolName)) {
			return { prepared: prepare({ kind: "unknown" }) };
		}
		const policy = this.policy.decide(toolName, rawArgs);
		if (policy.decision === "deny") {
			return {
				prepared: prepare({
					kind: "denied",
					reason: policy.reason ?? `denied by policy (${toolName})`,
				}),
			};
		}
		if (policy.decision === "allow") {
			return { prepared: prepare({ kind: "allowed" }) };
		}

		const scopes = this.policy.describeRememberedRules(
			toolName,
			rawArgs,
			"scope",
		);
		const opened = this.coordinator.open({
			exchangeId: state.exchangeId,
			toolCallId: call.id,
			tool: toolName,
			arguments: args,
			rawArgs,
			description: this.policy.describeCall(toolName, rawArgs),
			scope: scopes.length ? scopes.join(", ") : null,
		});
		return {
			prepared: prepare({
				kind: "ticket",
				ticketId: opened.ticket.id,
				decision: opened.decision,
			}),
			approval: {
				type: "tool_approval_request",
				ticket_id: opened.ticket.id,
				tool_call_id: call.id,
				tool: toolName,
				args,
				description: opened.ticket.description,
				scope: opened.ticket.scope,
			},
		};
	}

	/** Record for a call whose fate was sealed before execution, if any. */
	private async decidedRecord(
		prepared: PreparedCall,
	): Promise<ToolInvocationRecord | null> {
		const { call, stage } = prepared;
		const toolName = call.function.name;
		const base = invocationBase(prepared);
		switch (stage.kind) {
			case "duplicate":
				return failedInvocation(
					base,
					"failed",
					"duplicate",
					`tool call ${call.id} was already handled in this exchange`,
				);
			case "unknown":
				return failedInvocation(
					base,
					"failed",
					"invalid_input",
					`Unknown tool: ${toolName}`,
				);
			case "blocked":
				return failedInvocation(base, "blocked", "blocked", stage.message);
			case "denied":
				return failedInvocation(base, "denied", "denied", stage.reason);
			case "ticket": {
				const outcome = await stage.decision;
				if (outcome.decision === "rejected") {
					return failedInvocation(
						base,
						"rejected",
						"rejected",
						"declined by user",
					);
				}
				if (outcome.decision === "superseded") {
					return failedInvocation(
						base,
						"superseded",
						"superseded",
						outcome.reason,
					);
				}
				return null;
			}
			case "allowed":
				return null;
		}
	}

	// The model stream failed: nothing from this turn runs, but every call
	// it produced is still recorded.
	private async abandonCall(
		prepared: PreparedCall,
	): Promise<ToolInvocationRecord> {
		return (
			(await this.decidedRecord(prepared)) ??
			failedInvocation(
				invocationBase(prepared),
				"superseded",
				"superseded",
				"model stream failed before the call ran",
			)
		);
	}

	private async settleCall(
		prepared: PreparedCall,
		signal: AbortSignal,
	): Promise<ToolInvocationRecord | null> {
		const decided = await this.decidedRecord(prepared);
		if (decided) return decided;
		const { call } = prepared;
		const toolName = call.function.name;
		const base = invocationBase(prepared);
		if (signal.aborted) return null;
		const regate = this.gate(toolName, call.function.arguments);
		if (!regate.allowed) {
			return failedInvocation(base, "blocked", "blocked", regate.message);
		}
		try {
			const result = await this.executeWithDeadline(call, signal);
			return completedInvocation(base, toolResultText(result));
		} catch (error) {
			if (isToolExecutionError(error)) {
				log(`tool ${toolName} failed (${error.kind}): ${error.message}`);
				return failedInvocation(base, "failed", error.kind, error.message);
			}
			log(`tool ${toolName} crashed: ${describeError(error)}`);
			return failedInvocation(base, "failed", "internal", describeError(error));
		}
	}

	private async executeWithDeadline(
		call: ToolCall,
		signal: AbortSignal,
	): Promise<ToolResult> {
		const toolName = call.function.name;
		const rawArgs = call.function.arguments;
		const { commandTimeoutSeconds, commandTimeoutMaxSeconds } =
			this.sandbox.limits;
		const requestedMs = this.registry.requestedTimeoutMs(toolName, rawArgs);
		const timeoutMs = Math.min(
			requestedMs ?? commandTimeoutSeconds * 1000,
			commandTimeoutMaxSeconds * 1000,
		);

		const controller = new AbortController();
		let rejectEarly: (error: ToolExecutionError) => void = () => {};
		const interrupted = new Promise<never>((_, reject) => {
			rejectEarly = reject;
		});
		const timer = setTimeout(() => {
			controller.abort();
			rejectEarly(
				new ToolExecutionError(
					"timeout",
					`${toolName} timed out after ${Math.round(timeoutMs / 1000)}s`,
				),
			);
		}, timeoutMs);
		const onAbort = (): void => {
			controller.abort();
			rejectEarly(
				new ToolExecutionError("cancelled", `${toolName} was cancelled`),
			);
		};
		signal.addEventListener("abort", onAbort, { once: true });

		try {
			return await Promise.race([
				this.registry.execute(
					toolName,
					rawArgs,
					createToolContext({ signal: controller.signal }),
				),
				interrupted,
			]);
		} finally {
			clearTimeout(timer);
			signal.removeEventListener("abort", onAbort);
		}
	}
}
