import type { MessageRole, NewMessage, SessionSummary, StoredMessage } from '../chat/types';

/**
 * Durable storage for sessions and their ordered message history.
 *
 * Implementations own every Session and Message record. Writes are
 * transactional and failures surface as `StorageUnavailableError`.
 */
export interface ConversationRepository {
	/** Creates a session, generating an id when none is given. An existing id is overwritten. */
	createSession(title?: string | null, sessionId?: string): Promise<string>;
	/** Creates the session with `title` unless it already exists. Resolves to whether it was created. */
	createSessionIfAbsent(sessionId: string, title: string | null): Promise<boolean>;
	sessionExists(sessionId: string): Promise<boolean>;
	getSession(sessionId: string): Promise<SessionSummary | null>;
	/** Creates the session first when it does not exist yet, then appends and touches `updatedAt`. */
	appendMessage(sessionId: string, role: MessageRole, content: string): Promise<void>;
	/** Same as `appendMessage` for several messages, all written in one transaction or none at all. */
	appendMessages(sessionId: string, messages: readonly NewMessage[]): Promise<void>;
	/** The `limit` most recent messages, oldest first. */
	getMessages(sessionId: string, limit: number): Promise<StoredMessage[]>;
	updateSessionTitleIfEmpty(sessionId: string, title: string): Promise<void>;
	/** Most recently updated first. */
	listSessions(limit?: number, offset?: number): Promise<SessionSummary[]>;
	deleteSession(sessionId: string): Promise<void>;
}
