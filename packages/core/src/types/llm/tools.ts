import type { JSONSchema7 } from "json-schema";

/**
 * Tool Call
 */
export type ToolCall = {
	id: string;
	type: "function";
	function: { name: string; arguments: string };
};

/**
 * Tool Definition
 */
export type ToolDefinition = {
	name: string;
	description: string;
	parameters: JSONSchema7;
	strict?: boolean;
};

export type JsonValue =
	| string
	| number
	| boolean
	| null
	| { [key: string]: JsonValue }
	| JsonValue[];

export type ToolResult =
	| { type: "text"; text: string }
	| { type: "json"; value: JsonValue };

export type ToolReturn = ToolResult | JsonValue;
