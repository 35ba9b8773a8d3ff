export {
	completedInvocation,
	failedInvocation,
	parseArgumentsValue,
	toolMessageContent,
	toolResultText,
} from "./invocation";
export {
	DEFAULT_MAX_ITERATIONS,
	type ExchangeOrchestratorOptions,
	type ExchangeRequest,
	type ExchangeRunOptions,
	ExchangeOrchestrator,
} from "./orchestrator";
export { buildHistoryMessages, formatUserPrompt } from "./prompt";
