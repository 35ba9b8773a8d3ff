import type { JSONSchema7, JSONSchema7Definition } from "json-schema";
import { toJSONSchema } from "zod";
import type { ToolDefinition, ToolResult, ToolReturn } from "../types/llm";
import { isToolResult } from "../types/llm";
import type { ToolContext } from "./context";
import { ToolExecutionError } from "./errors";
import type { DefineToolOptions, Tool } from "./tool";

type SchemaTransform = (schema: JSONSchema7) => JSONSchema7;

const mapDefinition = (
	definition: JSONSchema7Definition,
	transform: SchemaTransform,
): JSONSchema7Definition =>
	typeof definition === "boolean"
		? definition
		: mapSchema(definition, transform);

const mapSchema = (
	schema: JSONSchema7,
	transform: SchemaTransform,
): JSONSchema7 => {
	const next = transform({ ...schema });

	if (next.properties) {
		const updated: Record<string, JSONSchema7Definition> = {};
		for (const [key, value] of Object.entries(next.properties)) {
			updated[key] = mapDefinition(value, transform);
		}
		next.properties = updated;
	}

	if (next.items !== undefined) {
		const items = next.items;
		next.items = Array.isArray(items)
			? items.map((item) => mapDefinition(item, transform))
			: mapDefinition(items, transform);
	}

	if (next.anyOf) {
		next.anyOf = next.anyOf.map((item) => mapDefinition(item, transform));
	}
	if (next.oneOf) {
		next.oneOf = next.oneOf.map((item) => mapDefinition(item, transform));
	}
	if (next.allOf) {
		next.allOf = next.allOf.map((item) => mapDefinition(item, transform));
	}

	return next;
};

const withNoAdditionalProperties = (schema: JSONSchema7): JSONSchema7 =>
	mapSchema(schema, (next) => {
		if (next.type === "object" && next.additionalProperties === undefined) {
			next.additionalProperties = false;
		}
		return next;
	});

function toToolResult(value: ToolReturn): ToolResult {
	if (isToolResult(value)) return value;
	if (typeof value === "string") return { type: "text", text: value };
	return { type: "json", value };
}

const parseRawArgs = (toolName: string, rawArgsJson: string): unknown => {
	try {
		return JSON.parse(rawArgsJson);
	} catch (error) {
		throw new ToolExecutionError(
			"invalid_input",
			`Invalid tool arguments JSON for ${toolName}: ${String(error)}`,
		);
	}
};

export function defineTool<TInput, TResult extends ToolReturn>(
	toolOptions: DefineToolOptions<TInput, TResult>,
): Tool {
	// zod describes its output with its own JSON Schema type.
	const parameters = toJSONSchema(toolOptions.input, {
		target: "draft-07",
		io: "input",
	}) as JSONSchema7;
	const strictParameters = withNoAdditionalProperties(parameters);

	return {
		name: toolOptions.name,
		description: toolOptions.description,
		definition: {
			name: toolOptions.name,
			description: toolOptions.description,
			parameters: strictParameters,
		} satisfies ToolDefinition,
		executeRaw: async (
			rawArgsJson: string,
			ctx: ToolContext,
		): Promise<ToolResult> => {
			const rawArgs = parseRawArgs(toolOptions.name, rawArgsJson);
			const parsed = toolOptions.input.safeParse(rawArgs);
			if (!parsed.success) {
				throw new ToolExecutionError(
					"invalid_input",
					`Tool input validation failed for ${toolOptions.name}: ${parsed.error.message}`,
				);
			}
			const result = await toolOptions.execute(parsed.data, ctx);
			return toToolResult(result);
		},
		requestedTimeoutMs: (rawArgsJson: string): number | undefined => {
			if (!toolOptions.timeoutSeconds) return undefined;
			let rawArgs: unknown;
			try {
				rawArgs = JSON.parse(rawArgsJson);
			} catch {
				return undefined;
			}
			const parsed = toolOptions.input.safeParse(rawArgs);
			if (!parsed.success) return undefined;
			const seconds = toolOptions.timeoutSeconds(parsed.data);
			return seconds === undefined ? undefined : seconds * 1000;
		},
	};
}
