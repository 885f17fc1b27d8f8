import type { Pool, PoolClient } from 'pg';
import { v4 as uuidv4 } from 'uuid';
import { StorageUnavailableError } from '../errors';
import type { MessageRole, NewMessage, SessionSummary, StoredMessage } from '../chat/types';
import type { ConversationRepository } from './conversationRepository';

type SessionRow = {
	id: string;
	title: string | null;
	created_at: Date | string;
	updated_at: Date | string;
};

type MessageRow = {
	session_id: string;
	role: MessageRole;
	content: string;
	created_at: Date | string;
};

export class PostgresConversationRepository implements ConversationRepository {
	constructor(private readonly pool: Pool) {}

	async createSession(title: string | null = null, sessionId?: string): Promise<string> {
		const id = sessionId || uuidv4();
		const now = new Date().toISOString();
		await this.run('createSession', () =>
			this.pool.query(
				`INSERT INTO sessions (id, title, created_at, updated_at) VALUES ($1, $2, $3, $4)
				ON CONFLICT (id) DO UPDATE SET title = EXCLUDED.title, created_at = EXCLUDED.created_at, updated_at = EXCLUDED.updated_at`,
				[id, title, now, now]
			)
		);
		return id;
	}

	async createSessionIfAbsent(sessionId: string, title: string | null): Promise<boolean> {
		const now = new Date().toISOString();
		const res = await this.run('createSessionIfAbsent', () =>
			this.pool.query(
				`INSERT INTO sessions (id, title, created_at, updated_at) VALUES ($1, $2, $3, $4)
				ON CONFLICT (id) DO NOTHING RETURNING id`,
				[sessionId, title, now, now]
			)
		);
		return res.rows.length > 0;
	}

	async sessionExists(sessionId: string): Promise<boolean> {
		const res = await this.run('sessionExists', () =>
			this.pool.query('SELECT 1 FROM sessions WHERE id = $1', [sessionId])
		);
		return res.rows.length > 0;
	}

	async getSession(sessionId: string): Promise<SessionSummary | null> {
		const res = await this.run('getSession', () =>
			this.pool.query<SessionRow>('SELECT id, title, created_at, updated_at FROM sessions WHERE id = $1', [sessionId])
		);
		const row = res.rows[0];
		return row ? toSession(row) : null;
	}

	async appendMessage(sessionId: string, role: MessageRole, content: string): Promise<void> {
		await this.appendMessages(sessionId, [{ role, content }]);
	}

	async appendMessages(sessionId: string, messages: readonly NewMessage[]): Promise<void> {
		// One timestamp for every message row and the session touch; ids keep their order.
		const now = new Date().toISOString();
		await this.transaction('appendMessage', async (client) => {
			const existing = await client.query('SELECT 1 FROM sessions WHERE id = $1', [sessionId]);
			if (existing.rows.length === 0) {
				// A concurrent writer may create the same session between the check and the insert.
				await client.query(
					'INSERT INTO sessions (id, title, created_at, updated_at) VALUES ($1, NULL, $2, $3) ON CONFLICT (id) DO NOTHING',
					[sessionId, now, now]
				);
			}
			for (const message of messages) {
				await client.query(
					'INSERT INTO messages (session_id, role, content, created_at) VALUES ($1, $2, $3, $4)',
					[sessionId, message.role, message.content, now]
				);
			}
			await client.query('UPDATE sessions SET updated_at = $1 WHERE id = $2', [now, sessionId]);
		});
	}

	async getMessages(sessionId: string, limit: number): Promise<StoredMessage[]> {
		const res = await this.run('getMessages', () =>
			this.pool.query<MessageRow>(
				'SELECT session_id, role, content, created_at FROM messages WHERE session_id = $1 ORDER BY created_at DESC, id DESC LIMIT $2',
				[sessionId, limit]
			)
		);
		return res.rows.map(toMessage).reverse();
	}

	async updateSessionTitleIfEmpty(sessionId: string, title: string): Promise<void> {
		// The emptiness check lives in the WHERE clause so racing setters cannot clobber a title.
		await this.run('updateSessionTitleIfEmpty', () =>
			this.pool.query(
				"UPDATE sessions SET title = $1 WHERE id = $2 AND (title IS NULL OR title = '')",
				[title, sessionId]
			)
		);
	}

	async listSessions(limit = 50, offset = 0): Promise<SessionSummary[]> {
		const res = await this.run('listSessions', () =>
			this.pool.query<SessionRow>(
				'SELECT id, title, created_at, updated_at FROM sessions ORDER BY updated_at DESC LIMIT $1 OFFSET $2',
				[limit, offset]
			)
		);
		return res.rows.map(toSession);
	}

	async deleteSession(sessionId: string): Promise<void> {
		await this.transaction('deleteSession', async (client) => {
			await client.query('DELETE FROM messages WHERE session_id = $1', [sessionId]);
			await client.query('DELETE FROM sessions WHERE id = $1', [sessionId]);
		});
	}

	private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
		try {
			return await fn();
		} catch (error) {
			throw new StorageUnavailableError(operation, error);
		}
	}

	private async transaction(operation: string, fn: (client: PoolClient) => Promise<void>): Promise<void> {
		let client: PoolClient;
		try {
			client = await this.pool.connect();
		} catch (error) {
			throw new StorageUnavailableError(operation, error);
		}
		try {
			await client.query('BEGIN');
			await fn(client);
			await client.query('COMMIT');
		} catch (error) {
			await client.query('ROLLBACK').catch((rollbackError: unknown) => {
				console.error(`Rollback failed during ${operation}:`, rollbackError);
			});
			throw new StorageUnavailableError(operation, error);
		} finally {
			client.release();
		}
	}
}

function toDate(value: Date | string): Date {
	return value instanceof Date ? value : new Date(value);
}

function toSession(row: SessionRow): SessionSummary {
	return {
		id: row.id,
		title: row.title,
		createdAt: toDate(row.created_at),
		updatedAt: toDate(row.updated_at),
	};
}

function toMessage(row: MessageRow): StoredMessage {
	return {
		sessionId: row.session_id,
		role: row.role,
		content: row.content,
		createdAt: toDate(row.created_at),
	};
}
