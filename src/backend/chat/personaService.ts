import type { AssistantClient } from '../agent';
import { extractText } from '../agent/content';
import { UpstreamAssistantError, describeError } from '../errors';
import type { PersonaDefinition } from '../personas';
import type { ConversationRepository } from '../store/conversationRepository';
import { KeyedQueue } from './keyedQueue';
import { resolveSession } from './sessions';
import { buildTranscript, historyLimit } from './transcript';
import type { AskResult } from './types';

export interface PersonaServiceDeps {
	persona: PersonaDefinition;
	repository: ConversationRepository;
	assistant: AssistantClient;
	maxHistoryTurns: number;
	/** Shared across personas so that calls naming one session id never interleave. */
	queue?: KeyedQueue;
}

export class PersonaService {
	readonly persona: PersonaDefinition;
	private readonly repo: ConversationRepository;
	private readonly assistant: AssistantClient;
	private readonly maxHistoryTurns: number;
	private readonly queue: KeyedQueue;

	constructor(deps: PersonaServiceDeps) {
		this.persona = deps.persona;
		this.repo = deps.repository;
		this.assistant = deps.assistant;
		this.maxHistoryTurns = deps.maxHistoryTurns;
		this.queue = deps.queue ?? new KeyedQueue();
	}

	repository(): ConversationRepository {
		return this.repo;
	}

	async ask(question: string, sessionId?: string | null): Promise<AskResult> {
		if (!sessionId) return this.askUnlocked(question, null);
		return this.queue.run(sessionId, () => this.askUnlocked(question, sessionId));
	}

	private async askUnlocked(question: string, requestedId: string | null): Promise<AskResult> {
		const { sessionId, created } = await resolveSession(this.repo, question, requestedId, this.persona.titlePrefix);
		if (created) console.log(`Session ${sessionId} started with "${this.persona.name}"`);

		const history = await this.repo.getMessages(sessionId, historyLimit(this.maxHistoryTurns));
		const prompt = buildTranscript(history, question);

		let content: unknown;
		try {
			const response = await this.assistant.getResponse(prompt);
			content = response.content;
		} catch (error) {
			console.error(`Assistant "${this.persona.name}" failed:`, describeError(error));
			throw new UpstreamAssistantError(this.persona.name, error);
		}
		const answer = extractText(content) ?? '';

		// Persisted only once a reply exists, and as one write, so a failure leaves no half turn behind.
		await this.repo.appendMessages(sessionId, [
			{ role: 'user', content: question },
			{ role: 'assistant', content: answer },
		]);

		return { answer, sessionId };
	}
}
