import type { Capability } from '../tools/capability';
import { buildWeatherTools } from '../tools/weatherTools';
import { buildMathTools } from '../tools/mathTools';
import { buildSommelierTools } from '../tools/sommelierTools';

export type PersonaName = 'weather' | 'math' | 'sommelier';

export const PERSONA_NAMES: readonly PersonaName[] = ['weather', 'math', 'sommelier'];

export interface PersonaDefinition {
	name: PersonaName;
	instructions: string;
	capabilities: readonly Capability[];
	/** Prepended to session titles created by this persona. */
	titlePrefix?: string;
}

export function isPersonaName(value: string): value is PersonaName {
	return PERSONA_NAMES.some((name) => name === value);
}

export function getPersonaDefinition(name: PersonaName): PersonaDefinition {
	switch (name) {
		case 'weather':
			return {
				name,
				instructions:
					'You are a travel weather chat bot named Frederick. Help users find the average temperature in a given city and month.',
				capabilities: buildWeatherTools(),
			};
		case 'math':
			return {
				name,
				instructions:
					'You are a patient math tutor. Use the arithmetic tools for every calculation and show the steps you took.',
				capabilities: buildMathTools(),
			};
		case 'sommelier':
			return {
				name,
				instructions:
					'You are a friendly sommelier. Recommend wines for the dishes users describe and explain each pairing in a sentence or two.',
				capabilities: buildSommelierTools(),
				titlePrefix: 'Sommelier',
			};
	}
}
