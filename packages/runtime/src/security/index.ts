export {
	type CommandCategory,
	type CommandVerdict,
	validateCommand,
} from "./command-gate";
export { IgnoreMatcher, loadIgnoreFile } from "./ignore";
export {
	type GateVerdict,
	type PathBlockReason,
	type PathGateOptions,
	resolveRealPath,
	validatePath,
} from "./path-gate";
export { type GateOutcome, gateToolCall } from "./tool-gate";
