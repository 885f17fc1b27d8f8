import { SessionNotFoundError } from '../errors';
import type { ConversationRepository } from '../store/conversationRepository';
import type { StoredMessage } from './types';

export const TITLE_MAX_LENGTH = 60;
export const PREFIXED_SNIPPET_LENGTH = 56;

export function titleFromQuestion(question: string, prefix?: string): string {
	const trimmed = question.trim();
	if (prefix) return `${prefix}: ${trimmed.slice(0, PREFIXED_SNIPPET_LENGTH)}`;
	return trimmed.slice(0, TITLE_MAX_LENGTH);
}

/**
 * Reuses `sessionId` when it exists. Otherwise creates the session (under the
 * supplied id, or a fresh one) titled from the question. An existing session
 * keeps its title, even one created concurrently by another writer.
 */
export async function resolveSession(
	repository: ConversationRepository,
	question: string,
	sessionId?: string | null,
	titlePrefix?: string
): Promise<{ sessionId: string; created: boolean }> {
	const title = titleFromQuestion(question, titlePrefix);
	if (sessionId) {
		const created = await repository.createSessionIfAbsent(sessionId, title);
		return { sessionId, created };
	}
	return { sessionId: await repository.createSession(title), created: true };
}

/** Like `repository.getMessages`, but an unknown session is an error rather than an empty list. */
export async function getSessionMessages(
	repository: ConversationRepository,
	sessionId: string,
	limit: number
): Promise<StoredMessage[]> {
	if (!(await repository.sessionExists(sessionId))) throw new SessionNotFoundError(sessionId);
	return repository.getMessages(sessionId, limit);
}
