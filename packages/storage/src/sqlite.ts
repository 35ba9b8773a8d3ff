import Database from "better-sqlite3";

export type SqliteAdapter = {
	exec: (sql: string) => void;
	run: (sql: string, params?: unknown[]) => { changes: number; lastInsertRowid: number };
	get: <T>(sql: string, params?: unknown[]) => T | undefined;
	all: <T>(sql: string, params?: unknown[]) => T[];
	transaction: <T>(fn: () => T) => T;
	close: () => void;
};

export const openSqlite = (filename: string): SqliteAdapter => {
	const db = new Database(filename);
	return {
		exec: (sql: string) => {
			db.exec(sql);
		},
		run: (sql: string, params: unknown[] = []) => {
			const result = db.prepare(sql).run(...params);
			return {
				changes: result.changes,
				lastInsertRowid: Number(result.lastInsertRowid),
			};
		},
		get: <T>(sql: string, params: unknown[] = []): T | undefined =>
			db.prepare<unknown[], T>(sql).get(...params),
		all: <T>(sql: string, params: unknown[] = []): T[] =>
			db.prepare<unknown[], T>(sql).all(...params),
		transaction: <T>(fn: () => T): T => db.transaction(fn)(),
		close: () => {
			db.close();
		},
	};
};
