import type { PersonaName } from '../personas';
import type { PersonaService } from './personaService';

export type PersonaFactory = (name: PersonaName) => PersonaService;

/**
 * Holds one PersonaService per persona. A service is built the first time it
 * is requested and reused for the life of the process.
 */
export class PersonaRegistry {
	private readonly services = new Map<PersonaName, PersonaService>();

	constructor(private readonly factory: PersonaFactory) {}

	get(name: PersonaName): PersonaService {
		let service = this.services.get(name);
		if (!service) {
			service = this.factory(name);
			this.services.set(name, service);
		}
		return service;
	}

	isReady(name: PersonaName): boolean {
		return this.services.has(name);
	}

	/** Builds every listed persona up front. */
	warmup(names: readonly PersonaName[]): void {
		for (const name of names) this.get(name);
	}
}
