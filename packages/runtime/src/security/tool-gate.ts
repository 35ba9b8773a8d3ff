import { parseRawArgsObject, pathArgument } from "../permissions/rules";
import { validateCommand } from "./command-gate";
import { type PathGateOptions, validatePath } from "./path-gate";

export type GateOutcome =
	| { allowed: true }
	| { allowed: false; message: string; detail: string };

/**
 * Runs the path or command validator a tool call needs. Arguments that do
 * not parse pass here and are rejected by the tool's own input schema.
 */
export const gateToolCall = (
	toolName: string,
	rawArgs: string,
	workspaceRoot: string,
	options: PathGateOptions = {},
): GateOutcome => {
	const args = parseRawArgsObject(rawArgs);
	if (toolName === "bash") {
		const command = args?.command;
		if (typeof command !== "string") return { allowed: true };
		const verdict = validateCommand(command);
		return verdict.allowed
			? verdict
			: {
					allowed: false,
					message: verdict.message,
					detail: `${verdict.category}: ${verdict.pattern}`,
				};
	}
	const target = pathArgument(toolName, args);
	if (target === undefined) return { allowed: true };
	const verdict = validatePath(target, workspaceRoot, options);
	return verdict.allowed
		? { allowed: true }
		: { allowed: false, message: verdict.message, detail: verdict.reason };
};
