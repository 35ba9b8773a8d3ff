import type { ZodType } from "zod";
import type { ToolDefinition, ToolResult, ToolReturn } from "../types/llm";
import type { ToolContext } from "./context";

export type DefineToolOptions<
	TInput,
	TResult extends ToolReturn = ToolReturn,
> = {
	name: string;
	description: string;
	input: ZodType<TInput>;
	execute: (input: TInput, ctx: ToolContext) => Promise<TResult> | TResult;
	// Seconds the caller asked the executor to run for, when the tool takes one.
	timeoutSeconds?: (input: TInput) => number | undefined;
};

export type Tool = {
	name: string;
	description: string;
	definition: ToolDefinition; // parameters is a JSON Schema
	executeRaw: (rawArgsJson: string, ctx: ToolContext) => Promise<ToolResult>;
	requestedTimeoutMs: (rawArgsJson: string) => number | undefined;
};
