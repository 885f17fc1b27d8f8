import { Pool } from 'pg';

export function createPool(connectionString: string): Pool {
	return new Pool({
		connectionString,
		max: 10,
		idleTimeoutMillis: 30000,
		connectionTimeoutMillis: 2000,
	});
}

// Executed one statement at a time; every statement is safe to re-run.
export const SCHEMA_STATEMENTS: readonly string[] = [
	`CREATE TABLE IF NOT EXISTS sessions (
		id TEXT PRIMARY KEY,
		title TEXT,
		created_at TIMESTAMPTZ NOT NULL,
		updated_at TIMESTAMPTZ NOT NULL
	)`,
	`CREATE TABLE IF NOT EXISTS messages (
		id SERIAL PRIMARY KEY,
		session_id TEXT NOT NULL REFERENCES sessions(id) ON DELETE CASCADE,
		role TEXT NOT NULL CHECK (role IN ('user', 'assistant', 'system')),
		content TEXT NOT NULL,
		created_at TIMESTAMPTZ NOT NULL
	)`,
	'CREATE INDEX IF NOT EXISTS idx_messages_session_created ON messages(session_id, created_at)',
	'CREATE INDEX IF NOT EXISTS idx_sessions_updated ON sessions(updated_at)',
];

export async function initDb(pool: Pool): Promise<void> {
	for (const statement of SCHEMA_STATEMENTS) {
		await pool.query(statement);
	}
}
