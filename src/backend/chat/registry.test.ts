import { describe, expect, it, vi } from 'vitest';
import { getPersonaDefinition, type PersonaName } from '../personas';
import { MemoryConversationRepository } from '../../test/memoryRepository';
import { ScriptedAssistant } from '../../test/fakes';
import { PersonaService } from './personaService';
import { PersonaRegistry } from './registry';

describe('PersonaRegistry', () => {
	const repository = new MemoryConversationRepository();
	const build = (name: PersonaName) =>
		new PersonaService({
			persona: getPersonaDefinition(name),
			repository,
			assistant: new ScriptedAssistant(),
			maxHistoryTurns: 10,
		});

	it('builds each persona once, on first access', () => {
		const factory = vi.fn(build);
		const registry = new PersonaRegistry(factory);

		expect(registry.isReady('math')).toBe(false);
		const first = registry.get('math');
		const second = registry.get('math');

		expect(first).toBe(second);
		expect(registry.isReady('math')).toBe(true);
		expect(factory).toHaveBeenCalledTimes(1);
		expect(first.persona.name).toBe('math');
	});

	it('warms up every listed persona', () => {
		const factory = vi.fn(build);
		const registry = new PersonaRegistry(factory);
		registry.warmup(['weather', 'sommelier']);
		registry.get('weather');

		expect(factory.mock.calls.map(([name]) => name)).toEqual(['weather', 'sommelier']);
		expect(registry.isReady('math')).toBe(false);
	});
});
