import type { MessageRole, StoredMessage } from './types';

const ROLE_LABELS: Record<MessageRole, string> = {
	system: 'System',
	user: 'User',
	assistant: 'Assistant',
};

/** A turn is one user message plus its reply, so the window holds two messages per turn. */
export function historyLimit(maxHistoryTurns: number): number {
	return maxHistoryTurns * 2;
}

export function buildTranscript(history: readonly Pick<StoredMessage, 'role' | 'content'>[], question: string): string {
	const lines = history.map((m) => `${ROLE_LABELS[m.role]}: ${m.content}`);
	lines.push(`User: ${question}`);
	lines.push('Assistant:');
	return lines.join('\n');
}
