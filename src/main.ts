import 'dotenv/config';
import { PersonaAgent } from './backend/agent';
import { createOidcVerifier } from './backend/auth/oidc';
import { KeyedQueue } from './backend/chat/keyedQueue';
import { PersonaService } from './backend/chat/personaService';
import { PersonaRegistry } from './backend/chat/registry';
import { loadConfig, type AppConfig } from './backend/config';
import { createPool, initDb } from './backend/db';
import { describeError } from './backend/errors';
import { createHttpServer } from './backend/http';
import { PERSONA_NAMES, getPersonaDefinition } from './backend/personas';
import { PostgresConversationRepository } from './backend/store/pgConversationRepository';

function buildRegistry(config: AppConfig, repository: PostgresConversationRepository): PersonaRegistry {
  const queue = new KeyedQueue();
  return new PersonaRegistry((name) => {
    const persona = getPersonaDefinition(name);
    const assistant = new PersonaAgent(persona, {
      endpoint: config.azureOpenAIEndpoint,
      apiKey: config.azureOpenAIApiKey,
      deploymentName: config.azureOpenAIDeploymentName,
      apiVersion: config.azureOpenAIApiVersion,
    });
    console.log(`Persona "${name}" ready`);
    return new PersonaService({ persona, repository, assistant, maxHistoryTurns: config.maxHistoryTurns, queue });
  });
}

async function start(): Promise<void> {
  const config = loadConfig();

  const pool = createPool(config.databaseUri);
  await initDb(pool);
  console.log('PostgreSQL connected and schema ready');

  const repository = new PostgresConversationRepository(pool);
  const personas = buildRegistry(config, repository);
  personas.warmup(PERSONA_NAMES);

  const verifyBearer = config.auth ? createOidcVerifier(config.auth) : null;
  if (!verifyBearer) console.warn('AUTH_ISSUER/AUTH_AUDIENCE not set; requests are not authenticated');

  const server = createHttpServer({ personas, repository, verifyBearer });
  server.listen(config.port, () => {
    console.log(`Listening on port ${config.port}`);
  });

  const shutdown = (signal: string): void => {
    console.log(`${signal} received, shutting down`);
    server.close(() => {
      pool
        .end()
        .then(() => console.log('PostgreSQL connection pool closed'))
        .catch((error: unknown) => console.error('Failed to close PostgreSQL pool:', describeError(error)))
        .finally(() => process.exit(0));
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

start().catch((error: unknown) => {
  console.error('Failed to start:', describeError(error));
  process.exit(1);
});
