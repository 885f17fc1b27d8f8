export type MessageRole = 'user' | 'assistant' | 'system';

export interface SessionSummary {
	id: string;
	title: string | null;
	createdAt: Date;
	updatedAt: Date;
}

export interface StoredMessage {
	sessionId: string;
	role: MessageRole;
	content: string;
	createdAt: Date;
}

export interface NewMessage {
	role: MessageRole;
	content: string;
}

export interface AskResult {
	answer: string;
	sessionId: string;
}

// Wire shapes returned by the HTTP layer.
export interface ChatSessionMeta {
	id: string;
	title: string | null;
	createdAt: string;
	updatedAt: string;
}

export interface ChatMessage {
	role: MessageRole;
	content: string;
	createdAt: string;
}
