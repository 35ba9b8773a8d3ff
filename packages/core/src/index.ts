export type {
	ResolveStorageOptions,
	StorageLayout,
	StoragePaths,
} from "./di/storage";
export type {
	ChatStreamInput,
	ProviderName,
	StreamingChatModel,
} from "./llm/base";
export { ModelTransportError } from "./llm/errors";
export { ChatOpenAI, type ChatOpenAIOptions } from "./llm/openai/chat";
export { getDefaultSystemPromptPath, loadSystemPrompt } from "./prompts";
export {
	REASONING_CLOSE_MARKER,
	REASONING_OPEN_MARKER,
	ReasoningScanner,
	type ScannerState,
	type ScanOutput,
} from "./reasoning/scanner";
export {
	createToolContext,
	type DependencyKey,
	type ToolContext,
} from "./tools/context";
export { defineTool } from "./tools/define";
export {
	isToolExecutionError,
	ToolExecutionError,
	type ToolErrorKind,
} from "./tools/errors";
export type { DefineToolOptions, Tool } from "./tools/tool";
export * from "./types/llm";
export type {
	AppendUserMessageInput,
	BlobInfo,
	CommitTurnInput,
	CreateSessionInput,
	RemoveSourceResult,
	SessionStore,
} from "./types/session-store";
export { createAbortError, isAbortError, throwIfAborted } from "./utils/abort";
