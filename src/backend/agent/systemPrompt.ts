/**
 * System prompt for a persona.
 *
 * The persona instructions come first; the current UTC time and the server
 * timezone follow so the model knows what day it is.
 */
export function getSystemPrompt(instructions: string, context?: { now?: Date; timeZone?: string }): string {
	const now = context?.now ?? new Date();
	const parts: string[] = [instructions.trim()];
	parts.push(`Current UTC time: ${now.toISOString()}.`);
	const tz = context?.timeZone ?? Intl.DateTimeFormat().resolvedOptions().timeZone;
	if (tz) parts.push(`Server timezone: ${tz}.`);
	return parts.join(' ');
}
