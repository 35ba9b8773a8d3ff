import { randomUUID } from "node:crypto";
import { mkdir } from "node:fs/promises";
import path from "node:path";
import type {
	AppendUserMessageInput,
	BlobInfo,
	CommitTurnInput,
	CreateSessionInput,
	RemoveSourceResult,
	SessionStore,
	StoragePaths,
} from "@tollgate/core";
import { debugLog, describeError, log } from "@tollgate/logger";
import type {
	Attachment,
	JsonValue,
	MessageRecord,
	MessageRole,
	SessionRecord,
	SessionSnapshot,
	SourceRecord,
	ToolInvocationRecord,
	ToolInvocationStatus,
} from "@tollgate/shared-types";
import { decodeBlob, encodeBlob } from "./blobs";
import { StorageError } from "./errors";
import { resolveStoragePaths } from "./paths";
import { openSqlite, type SqliteAdapter } from "./sqlite";

const TITLE_MAX_LENGTH = 100;

type SessionRow = {
	id: string;
	title: string | null;
	model_id: string | null;
	created_at: string;
	updated_at: string;
	input_tokens: number;
	output_tokens: number;
	reasoning_tokens: number;
	cache_tokens: number;
	total_tokens: number;
};

type MessageRow = {
	id: number;
	session_id: string;
	ordinal: number;
	role: MessageRole;
	content: string;
	reasoning: string | null;
	created_at: string;
};

type ToolInvocationRow = {
	message_id: number;
	tool_call_id: string;
	tool_name: string;
	arguments_json: string;
	status: ToolInvocationStatus;
	result: string | null;
	error_kind: string | null;
	error_message: string | null;
};

type SourceRow = {
	id: number;
	message_id: number;
	title: string;
	content_hash: string;
	original_size: number;
};

type BlobRow = {
	content_hash: string;
	content_compressed: Buffer;
	original_size: number;
	compressed_size: number;
	ref_count: number;
};

export type SqliteSessionStoreOptions = {
	paths?: StoragePaths;
	databaseFile?: string;
	now?: () => Date;
	onError?: (
		error: unknown,
		context: { action: string; detail?: string },
	) => void;
};

export const deriveSessionTitle = (message: string): string | null => {
	const trimmed = message.trim();
	if (!trimmed) return null;
	if (trimmed.length <= TITLE_MAX_LENGTH) return trimmed;
	return `${trimmed.slice(0, TITLE_MAX_LENGTH - 3)}...`;
};

const parseArguments = (raw: string): JsonValue => {
	try {
		return JSON.parse(raw);
	} catch {
		return raw;
	}
};

const toSessionRecord = (row: SessionRow): SessionRecord => ({
	id: row.id,
	title: row.title,
	model_id: row.model_id,
	created_at: row.created_at,
	updated_at: row.updated_at,
	input_tokens: row.input_tokens,
	output_tokens: row.output_tokens,
	reasoning_tokens: row.reasoning_tokens,
	cache_tokens: row.cache_tokens,
	total_tokens: row.total_tokens,
});

const toToolInvocationRecord = (
	row: ToolInvocationRow,
): ToolInvocationRecord => ({
	tool_call_id: row.tool_call_id,
	tool_name: row.tool_name,
	arguments: parseArguments(row.arguments_json),
	status: row.status,
	result: row.result,
	error:
		row.error_kind !== null
			? { kind: row.error_kind, message: row.error_message ?? "" }
			: null,
});

const toSourceRecord = (row: SourceRow): SourceRecord => ({
	id: row.id,
	title: row.title,
	content_hash: row.content_hash,
	size: row.original_size,
});

const SESSION_COLUMNS =
	"id, title, model_id, created_at, updated_at, input_tokens, output_tokens, reasoning_tokens, cache_tokens, total_tokens";

const SOURCE_SELECT = `
	SELECT sources.id, sources.message_id, sources.title, sources.content_hash,
		content_blobs.original_size
	FROM sources
	JOIN content_blobs ON content_blobs.content_hash = sources.content_hash
`;

/**
 * Session log on SQLite. better-sqlite3 runs each transaction synchronously,
 * so writes for one session are serialized in process and a turn commit is
 * all-or-nothing.
 */
export class SqliteSessionStore implements SessionStore {
	private readonly databaseFile: string;
	private readonly now: () => Date;
	private readonly onError?: SqliteSessionStoreOptions["onError"];
	private db: Promise<SqliteAdapter> | null = null;

	constructor(options: SqliteSessionStoreOptions = {}) {
		const paths = options.paths ?? resolveStoragePaths();
		this.databaseFile = options.databaseFile ?? paths.databaseFile;
		this.now = options.now ?? (() => new Date());
		this.onError = options.onError;
	}

	async createSession(input: CreateSessionInput = {}): Promise<SessionRecord> {
		return this.write("create_session", undefined, (db) => {
			const timestamp = this.timestamp();
			const id = randomUUID();
			db.run(
				`INSERT INTO sessions (id, title, model_id, created_at, updated_at)
				VALUES (?, NULL, ?, ?, ?)`,
				[id, input.modelId ?? null, timestamp, timestamp],
			);
			return this.requireSession(db, id, "create_session");
		});
	}

	async getSession(sessionId: string): Promise<SessionRecord | null> {
		return this.read("get_session", sessionId, (db) => {
			const row = db.get<SessionRow>(
				`SELECT ${SESSION_COLUMNS} FROM sessions WHERE id = ?`,
				[sessionId],
			);
			return row ? toSessionRecord(row) : null;
		});
	}

	async listSessions(): Promise<SessionRecord[]> {
		return this.read("list_sessions", undefined, (db) =>
			db
				.all<SessionRow>(
					`SELECT ${SESSION_COLUMNS} FROM sessions ORDER BY updated_at DESC, id`,
				)
				.map(toSessionRecord),
		);
	}

	async renameSession(
		sessionId: string,
		title: string,
	): Promise<SessionRecord | null> {
		return this.write("rename_session", sessionId, (db) => {
			const result = db.run(
				"UPDATE sessions SET title = ?, updated_at = ? WHERE id = ?",
				[title, this.timestamp(), sessionId],
			);
			if (result.changes === 0) return null;
			return this.requireSession(db, sessionId, "rename_session");
		});
	}

	async deleteSession(sessionId: string): Promise<boolean> {
		return this.write("delete_session", sessionId, (db) => {
			const hashes = db
				.all<{ content_hash: string }>(
					`SELECT sources.content_hash FROM sources
					JOIN messages ON messages.id = sources.message_id
					WHERE messages.session_id = ?`,
					[sessionId],
				)
				.map((row) => row.content_hash);
			const result = db.run("DELETE FROM sessions WHERE id = ?", [sessionId]);
			for (const hash of hashes) {
				this.releaseBlob(db, hash);
			}
			return result.changes > 0;
		});
	}

	async appendUserMessage(
		sessionId: string,
		input: AppendUserMessageInput,
	): Promise<MessageRecord> {
		return this.write("append_user_message", sessionId, (db) => {
			const session = this.requireSession(db, sessionId, "append_user_message");
			const timestamp = this.timestamp();
			const messageId = this.insertMessage(db, sessionId, {
				role: "user",
				content: input.content,
				reasoning: null,
				createdAt: timestamp,
			});
			this.insertSources(db, messageId, input.attachments ?? [], timestamp);
			const title = session.title ?? deriveSessionTitle(input.content);
			db.run("UPDATE sessions SET title = ?, updated_at = ? WHERE id = ?", [
				title,
				timestamp,
				sessionId,
			]);
			return this.requireMessage(db, messageId);
		});
	}

	async commitTurn(
		sessionId: string,
		input: CommitTurnInput,
	): Promise<MessageRecord> {
		return this.write("commit_turn", sessionId, (db) => {
			this.requireSession(db, sessionId, "commit_turn");
			const timestamp = this.timestamp();
			const messageId = this.insertMessage(db, sessionId, {
				role: "assistant",
				content: input.content,
				reasoning: input.reasoning,
				createdAt: timestamp,
			});
			input.toolInvocations.forEach((invocation, position) => {
				db.run(
					`INSERT INTO tool_invocations (
						message_id, position, tool_call_id, tool_name, arguments_json,
						status, result, error_kind, error_message
					) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
					[
						messageId,
						position,
						invocation.tool_call_id,
						invocation.tool_name,
						JSON.stringify(invocation.arguments),
						invocation.status,
						invocation.result,
						invocation.error?.kind ?? null,
						invocation.error?.message ?? null,
					],
				);
			});
			this.insertSources(db, messageId, input.attachments ?? [], timestamp);
			const usage = input.usage;
			const turnTotal =
				usage.input_tokens +
				usage.output_tokens +
				usage.reasoning_tokens +
				usage.cache_tokens;
			db.run(
				`UPDATE sessions SET
					input_tokens = input_tokens + ?,
					output_tokens = output_tokens + ?,
					reasoning_tokens = reasoning_tokens + ?,
					cache_tokens = cache_tokens + ?,
					total_tokens = total_tokens + ?,
					model_id = COALESCE(?, model_id),
					updated_at = ?
				WHERE id = ?`,
				[
					usage.input_tokens,
					usage.output_tokens,
					usage.reasoning_tokens,
					usage.cache_tokens,
					turnTotal,
					input.modelId ?? null,
					timestamp,
					sessionId,
				],
			);
			return this.requireMessage(db, messageId);
		});
	}

	async loadSession(sessionId: string): Promise<SessionSnapshot | null> {
		return this.read("load_session", sessionId, (db) => {
			const sessionRow = db.get<SessionRow>(
				`SELECT ${SESSION_COLUMNS} FROM sessions WHERE id = ?`,
				[sessionId],
			);
			if (!sessionRow) return null;
			const messageRows = db.all<MessageRow>(
				`SELECT id, session_id, ordinal, role, content, reasoning, created_at
				FROM messages WHERE session_id = ? ORDER BY ordinal`,
				[sessionId],
			);
			const invocations = db.all<ToolInvocationRow>(
				`SELECT tool_invocations.message_id, tool_call_id, tool_name,
					arguments_json, status, result, error_kind, error_message
				FROM tool_invocations
				JOIN messages ON messages.id = tool_invocations.message_id
				WHERE messages.session_id = ?
				ORDER BY tool_invocations.message_id, tool_invocations.position`,
				[sessionId],
			);
			const sources = db.all<SourceRow>(
				`${SOURCE_SELECT}
				JOIN messages ON messages.id = sources.message_id
				WHERE messages.session_id = ?
				ORDER BY sources.message_id, sources.position`,
				[sessionId],
			);
			return {
				session: toSessionRecord(sessionRow),
				messages: messageRows.map((row) =>
					this.toMessageRecord(
						row,
						invocations.filter((entry) => entry.message_id === row.id),
						sources.filter((entry) => entry.message_id === row.id),
					),
				),
			};
		});
	}

	async readSourceContent(sourceId: number): Promise<string | null> {
		return this.read("read_source", String(sourceId), (db) => {
			const row = db.get<Pick<BlobRow, "content_compressed">>(
				`SELECT content_blobs.content_compressed FROM sources
				JOIN content_blobs ON content_blobs.content_hash = sources.content_hash
				WHERE sources.id = ?`,
				[sourceId],
			);
			return row ? decodeBlob(row.content_compressed) : null;
		});
	}

	async removeSource(sourceId: number): Promise<RemoveSourceResult> {
		return this.write("remove_source", String(sourceId), (db) => {
			const row = db.get<{ content_hash: string }>(
				"SELECT content_hash FROM sources WHERE id = ?",
				[sourceId],
			);
			if (!row) return { removed: false, reclaimed: false };
			db.run("DELETE FROM sources WHERE id = ?", [sourceId]);
			return { removed: true, reclaimed: this.releaseBlob(db, row.content_hash) };
		});
	}

	async getBlob(contentHash: string): Promise<BlobInfo | null> {
		return this.read("get_blob", contentHash, (db) => {
			const row = db.get<Omit<BlobRow, "content_compressed">>(
				`SELECT content_hash, original_size, compressed_size, ref_count
				FROM content_blobs WHERE content_hash = ?`,
				[contentHash],
			);
			return row
				? {
						content_hash: row.content_hash,
						ref_count: row.ref_count,
						original_size: row.original_size,
						compressed_size: row.compressed_size,
					}
				: null;
		});
	}

	async close(): Promise<void> {
		if (!this.db) return;
		const pending = this.db;
		this.db = null;
		const db = await pending;
		db.close();
	}

	private timestamp(): string {
		return this.now().toISOString();
	}

	private insertMessage(
		db: SqliteAdapter,
		sessionId: string,
		message: {
			role: MessageRole;
			content: string;
			reasoning: string | null;
			createdAt: string;
		},
	): number {
		const next = db.get<{ next: number }>(
			"SELECT COALESCE(MAX(ordinal), 0) + 1 AS next FROM messages WHERE session_id = ?",
			[sessionId],
		);
		const result = db.run(
			`INSERT INTO messages (session_id, ordinal, role, content, reasoning, created_at)
			VALUES (?, ?, ?, ?, ?, ?)`,
			[
				sessionId,
				next?.next ?? 1,
				message.role,
				message.content,
				message.reasoning,
				message.createdAt,
			],
		);
		return result.lastInsertRowid;
	}

	private insertSources(
		db: SqliteAdapter,
		messageId: number,
		attachments: Attachment[],
		timestamp: string,
	): void {
		attachments.forEach((attachment, position) => {
			const hash = this.retainBlob(db, attachment.content, timestamp);
			db.run(
				`INSERT INTO sources (message_id, position, title, content_hash)
				VALUES (?, ?, ?, ?)`,
				[messageId, position, attachment.filename, hash],
			);
		});
	}

	// Stores the bytes once per hash; later uploads only bump the count.
	private retainBlob(
		db: SqliteAdapter,
		content: string,
		timestamp: string,
	): string {
		const blob = encodeBlob(content);
		const updated = db.run(
			"UPDATE content_blobs SET ref_count = ref_count + 1 WHERE content_hash = ?",
			[blob.hash],
		);
		if (updated.changes === 0) {
			db.run(
				`INSERT INTO content_blobs (
					content_hash, content_compressed, original_size, compressed_size,
					ref_count, created_at
				) VALUES (?, ?, ?, ?, 1, ?)`,
				[
					blob.hash,
					blob.compressed,
					blob.originalSize,
					blob.compressed.length,
					timestamp,
				],
			);
			debugLog(`storage blob created ${blob.hash.slice(0, 12)}`);
		}
		return blob.hash;
	}

	// Returns true when the last reference went away and the blob was deleted.
	private releaseBlob(db: SqliteAdapter, contentHash: string): boolean {
		db.run(
			"UPDATE content_blobs SET ref_count = ref_count - 1 WHERE content_hash = ? AND ref_count > 0",
			[contentHash],
		);
		const deleted = db.run(
			"DELETE FROM content_blobs WHERE content_hash = ? AND ref_count = 0",
			[contentHash],
		);
		if (deleted.changes > 0) {
			debugLog(`storage blob reclaimed ${contentHash.slice(0, 12)}`);
			return true;
		}
		return false;
	}

	private requireSession(
		db: SqliteAdapter,
		sessionId: string,
		action: string,
	): SessionRecord {
		const row = db.get<SessionRow>(
			`SELECT ${SESSION_COLUMNS} FROM sessions WHERE id = ?`,
			[sessionId],
		);
		if (!row) {
			throw new StorageError(action, `session not found: ${sessionId}`);
		}
		return toSessionRecord(row);
	}

	private requireMessage(db: SqliteAdapter, messageId: number): MessageRecord {
		const row = db.get<MessageRow>(
			`SELECT id, session_id, ordinal, role, content, reasoning, created_at
			FROM messages WHERE id = ?`,
			[messageId],
		);
		if (!row) {
			throw new StorageError("read_message", `message not found: ${messageId}`);
		}
		const invocations = db.all<ToolInvocationRow>(
			`SELECT message_id, tool_call_id, tool_name, arguments_json, status,
				result, error_kind, error_message
			FROM tool_invocations WHERE message_id = ? ORDER BY position`,
			[messageId],
		);
		const sources = db.all<SourceRow>(
			`${SOURCE_SELECT} WHERE sources.message_id = ? ORDER BY sources.position`,
			[messageId],
		);
		return this.toMessageRecord(row, invocations, sources);
	}

	private toMessageRecord(
		row: MessageRow,
		invocations: ToolInvocationRow[],
		sources: SourceRow[],
	): MessageRecord {
		return {
			id: row.id,
			session_id: row.session_id,
			ordinal: row.ordinal,
			role: row.role,
			content: row.content,
			reasoning: row.reasoning,
			tool_invocations: invocations.map(toToolInvocationRecord),
			sources: sources.map(toSourceRecord),
			created_at: row.created_at,
		};
	}

	private async read<T>(
		action: string,
		detail: string | undefined,
		fn: (db: SqliteAdapter) => T,
	): Promise<T> {
		const db = await this.requireDb(action, detail);
		return this.guard(action, detail, () => fn(db));
	}

	private async write<T>(
		action: string,
		detail: string | undefined,
		fn: (db: SqliteAdapter) => T,
	): Promise<T> {
		const db = await this.requireDb(action, detail);
		return this.guard(action, detail, () => db.transaction(() => fn(db)));
	}

	private guard<T>(action: string, detail: string | undefined, fn: () => T): T {
		try {
			return fn();
		} catch (error) {
			this.onError?.(error, { action, detail });
			if (error instanceof StorageError) throw error;
			log(`storage ${action} failed: ${describeError(error)}`);
			throw new StorageError(action, describeError(error), { cause: error });
		}
	}

	private async requireDb(
		action: string,
		detail?: string,
	): Promise<SqliteAdapter> {
		if (!this.db) {
			this.db = this.openDatabase();
		}
		try {
			return await this.db;
		} catch (error) {
			this.db = null;
			this.onError?.(error, { action: `${action}.db_unavailable`, detail });
			throw new StorageError(
				action,
				`session database unavailable: ${describeError(error)}`,
				{ cause: error },
			);
		}
	}

	private async openDatabase(): Promise<SqliteAdapter> {
		if (this.databaseFile !== ":memory:") {
			await mkdir(path.dirname(this.databaseFile), { recursive: true });
		}
		const db = openSqlite(this.databaseFile);
		initDatabaseSchema(db);
		return db;
	}
}

const initDatabaseSchema = (db: SqliteAdapter): void => {
	db.exec("PRAGMA journal_mode = WAL;");
	db.exec("PRAGMA foreign_keys = ON;");
	db.exec(`
		CREATE TABLE IF NOT EXISTS sessions (
			id TEXT PRIMARY KEY,
			title TEXT,
			model_id TEXT,
			created_at TEXT NOT NULL,
			updated_at TEXT NOT NULL,
			input_tokens INTEGER NOT NULL DEFAULT 0,
			output_tokens INTEGER NOT NULL DEFAULT 0,
			reasoning_tokens INTEGER NOT NULL DEFAULT 0,
			cache_tokens INTEGER NOT NULL DEFAULT 0,
			total_tokens INTEGER NOT NULL DEFAULT 0
		);
	`);
	db.exec(`
		CREATE TABLE IF NOT EXISTS messages (
			id INTEGER PRIMARY KEY AUTOINCREMENT,
			session_id TEXT NOT NULL REFERENCES sessions(id) ON DELETE CASCADE,
			ordinal INTEGER NOT NULL,
			role TEXT NOT NULL CHECK (role IN ('user', 'assistant')),
			content TEXT NOT NULL,
			reasoning TEXT,
			created_at TEXT NOT NULL,
			UNIQUE (session_id, ordinal)
		);
	`);
	db.exec(`
		CREATE TABLE IF NOT EXISTS tool_invocations (
			id INTEGER PRIMARY KEY AUTOINCREMENT,
			message_id INTEGER NOT NULL REFERENCES messages(id) ON DELETE CASCADE,
			position INTEGER NOT NULL,
			tool_call_id TEXT NOT NULL CHECK (length(tool_call_id) > 0),
			tool_name TEXT NOT NULL,
			arguments_json TEXT NOT NULL,
			status TEXT NOT NULL,
			result TEXT,
			error_kind TEXT,
			error_message TEXT,
			UNIQUE (message_id, position)
		);
	`);
	db.exec(`
		CREATE TABLE IF NOT EXISTS content_blobs (
			content_hash TEXT PRIMARY KEY,
			content_compressed BLOB NOT NULL,
			original_size INTEGER NOT NULL,
			compressed_size INTEGER NOT NULL,
			ref_count INTEGER NOT NULL CHECK (ref_count >= 0),
			created_at TEXT NOT NULL
		);
	`);
	db.exec(`
		CREATE TABLE IF NOT EXISTS sources (
			id INTEGER PRIMARY KEY AUTOINCREMENT,
			message_id INTEGER NOT NULL REFERENCES messages(id) ON DELETE CASCADE,
			position INTEGER NOT NULL,
			title TEXT NOT NULL,
			content_hash TEXT NOT NULL REFERENCES content_blobs(content_hash)
		);
	`);
	db.exec(`
		CREATE INDEX IF NOT EXISTS idx_messages_session
		ON messages(session_id, ordinal);
	`);
	db.exec(`
		CREATE INDEX IF NOT EXISTS idx_sources_hash
		ON sources(content_hash);
	`);
};
