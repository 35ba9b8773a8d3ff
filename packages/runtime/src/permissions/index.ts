export {
	PermissionPolicy,
	type PolicyDecision,
	type PolicySnapshot,
} from "./service";
export {
	extractCommand,
	isSameRule,
	normalizeCommand,
	parseRawArgsObject,
	splitCommandSegments,
} from "./rules";
export { deriveRememberCommand } from "./scope";
