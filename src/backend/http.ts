import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { z } from 'zod';
import type { BearerVerifier } from './auth/oidc';
import type { PersonaRegistry } from './chat/registry';
import { getSessionMessages } from './chat/sessions';
import type { ChatMessage, ChatSessionMeta, SessionSummary, StoredMessage } from './chat/types';
import { ChatBackendError, RequestValidationError, SessionNotFoundError, describeError } from './errors';
import { isPersonaName, type PersonaName } from './personas';
import type { ConversationRepository } from './store/conversationRepository';

export interface HttpDeps {
	personas: PersonaRegistry;
	repository: ConversationRepository;
	/** When null, requests are not authenticated. */
	verifyBearer: BearerVerifier | null;
}

const MAX_BODY_BYTES = 1024 * 1024;
export const DEFAULT_PERSONA: PersonaName = 'weather';

const chatRequestSchema = z.object({
	// Stored and sent exactly as given; only whitespace-only questions are rejected.
	question: z.string().refine((q) => q.trim().length > 0, 'question must not be empty'),
	sessionId: z.string().min(1).nullish(),
});

const listSessionsQuery = z.object({
	limit: z.coerce.number().int().min(1).max(500).default(50),
	offset: z.coerce.number().int().min(0).default(0),
});

const messagesQuery = z.object({
	limit: z.coerce.number().int().min(1).max(500).default(50),
});

class RouteNotFoundError extends ChatBackendError {
	constructor(message = 'not found') {
		super(message, 404);
	}
}

function toSessionMeta(s: SessionSummary): ChatSessionMeta {
	return { id: s.id, title: s.title, createdAt: s.createdAt.toISOString(), updatedAt: s.updatedAt.toISOString() };
}

function toChatMessage(m: StoredMessage): ChatMessage {
	return { role: m.role, content: m.content, createdAt: m.createdAt.toISOString() };
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
	const payload = JSON.stringify(body);
	res.writeHead(status, { 'Content-Type': 'application/json', 'Content-Length': Buffer.byteLength(payload) });
	res.end(payload);
}

function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown): z.infer<S> {
	const parsed = schema.safeParse(value);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		throw new RequestValidationError(issue ? `${issue.path.join('.') || 'body'}: ${issue.message}` : 'invalid request');
	}
	return parsed.data;
}

function decodeSegment(segment: string): string {
	try {
		return decodeURIComponent(segment);
	} catch {
		throw new RequestValidationError('malformed path');
	}
}

async function readJson(req: IncomingMessage): Promise<unknown> {
	const chunks: Buffer[] = [];
	let size = 0;
	for await (const chunk of req) {
		const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
		size += buf.length;
		if (size > MAX_BODY_BYTES) throw new RequestValidationError('request body too large');
		chunks.push(buf);
	}
	const raw = Buffer.concat(chunks).toString('utf8');
	if (!raw) return {};
	try {
		return JSON.parse(raw);
	} catch {
		throw new RequestValidationError('request body must be valid JSON');
	}
}

async function route(deps: HttpDeps, req: IncomingMessage, res: ServerResponse): Promise<void> {
	const url = new URL(req.url ?? '/', 'http://localhost');
	const segments = url.pathname.split('/').filter(Boolean).map(decodeSegment);
	const query = Object.fromEntries(url.searchParams);
	const method = req.method ?? 'GET';

	if (method === 'GET' && url.pathname === '/healthz') {
		sendJson(res, 200, { status: 'ok' });
		return;
	}

	if (deps.verifyBearer) await deps.verifyBearer(req.headers.authorization);

	if (method === 'POST' && segments[0] === 'chat' && segments.length <= 2) {
		const name = segments[1] ?? DEFAULT_PERSONA;
		if (!isPersonaName(name)) throw new RouteNotFoundError(`unknown persona "${name}"`);
		const body = parseWith(chatRequestSchema, await readJson(req));
		const result = await deps.personas.get(name).ask(body.question, body.sessionId);
		sendJson(res, 200, result);
		return;
	}

	if (segments[0] === 'sessions') {
		if (method === 'GET' && segments.length === 1) {
			const { limit, offset } = parseWith(listSessionsQuery, query);
			const sessions = await deps.repository.listSessions(limit, offset);
			sendJson(res, 200, sessions.map(toSessionMeta));
			return;
		}
		const sessionId = segments[1];
		if (method === 'GET' && sessionId && segments.length === 2) {
			const session = await deps.repository.getSession(sessionId);
			if (!session) throw new SessionNotFoundError(sessionId);
			sendJson(res, 200, toSessionMeta(session));
			return;
		}
		if (method === 'GET' && sessionId && segments[2] === 'messages' && segments.length === 3) {
			const { limit } = parseWith(messagesQuery, query);
			const messages = await getSessionMessages(deps.repository, sessionId, limit);
			sendJson(res, 200, messages.map(toChatMessage));
			return;
		}
		if (method === 'DELETE' && sessionId && segments.length === 2) {
			await deps.repository.deleteSession(sessionId);
			sendJson(res, 200, { status: 'ok' });
			return;
		}
	}

	throw new RouteNotFoundError();
}

export function createHttpServer(deps: HttpDeps): Server {
	return createServer((req, res) => {
		route(deps, req, res).catch((error: unknown) => {
			if (error instanceof ChatBackendError) {
				if (error.status >= 500) console.error(`${req.method} ${req.url} failed:`, error, error.cause);
				else console.warn(`${req.method} ${req.url} rejected: ${error.message}`);
				sendJson(res, error.status, { detail: error.message });
				return;
			}
			console.error(`${req.method} ${req.url} failed:`, describeError(error));
			sendJson(res, 500, { detail: 'internal server error' });
		});
	});
}
