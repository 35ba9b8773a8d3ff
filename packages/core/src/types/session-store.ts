import type {
	Attachment,
	MessageRecord,
	SessionRecord,
	SessionSnapshot,
	TokenUsage,
	ToolInvocationRecord,
} from "@tollgate/shared-types";

export type CreateSessionInput = {
	modelId?: string | null;
};

export type AppendUserMessageInput = {
	content: string;
	attachments?: Attachment[];
};

export type CommitTurnInput = {
	content: string;
	reasoning: string | null;
	toolInvocations: ToolInvocationRecord[];
	attachments?: Attachment[];
	usage: TokenUsage;
	modelId?: string | null;
};

export type BlobInfo = {
	content_hash: string;
	ref_count: number;
	original_size: number;
	compressed_size: number;
};

export type RemoveSourceResult = {
	removed: boolean;
	reclaimed: boolean;
};

/**
 * Durable, ordered conversation log. Each write is atomic: a message lands
 * together with its reasoning, tool invocations and sources, or not at all.
 */
export interface SessionStore {
	createSession(input?: CreateSessionInput): Promise<SessionRecord>;
	getSession(sessionId: string): Promise<SessionRecord | null>;
	listSessions(): Promise<SessionRecord[]>;
	renameSession(sessionId: string, title: string): Promise<SessionRecord | null>;
	deleteSession(sessionId: string): Promise<boolean>;
	appendUserMessage(
		sessionId: string,
		input: AppendUserMessageInput,
	): Promise<MessageRecord>;
	commitTurn(sessionId: string, input: CommitTurnInput): Promise<MessageRecord>;
	loadSession(sessionId: string): Promise<SessionSnapshot | null>;
	readSourceContent(sourceId: number): Promise<string | null>;
	removeSource(sourceId: number): Promise<RemoveSourceResult>;
	getBlob(contentHash: string): Promise<BlobInfo | null>;
	close(): Promise<void>;
}
