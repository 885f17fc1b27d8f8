import { z } from 'zod';
import { defineCapability, type Capability } from './capability';

// Keyword -> suggestion; the first keyword found in the dish wins.
const PAIRINGS: ReadonlyArray<[string, string]> = [
  ['steak', 'Cabernet Sauvignon'],
  ['lamb', 'Syrah'],
  ['pork', 'Pinot Noir'],
  ['duck', 'Pinot Noir'],
  ['salmon', 'Pinot Noir'],
  ['oyster', 'Champagne'],
  ['shellfish', 'Sauvignon Blanc'],
  ['fish', 'Sauvignon Blanc'],
  ['chicken', 'Chardonnay'],
  ['pasta', 'Chianti'],
  ['pizza', 'Sangiovese'],
  ['cheese', 'Port'],
  ['chocolate', 'Port'],
  ['curry', 'Riesling'],
  ['sushi', 'Riesling'],
];

export const DEFAULT_PAIRING = 'a dry Rosé';

export function suggestWine(dish: string): string {
  const normalized = dish.toLowerCase();
  const match = PAIRINGS.find(([keyword]) => normalized.includes(keyword));
  return match ? match[1] : DEFAULT_PAIRING;
}

export const winePairing = defineCapability({
  name: 'wine_pairing',
  description: 'Takes a dish and returns a wine that pairs well with it.',
  schema: z.object({
    dish: z.string().describe('The dish to pair a wine with.'),
  }),
  invoke: ({ dish }) => `For ${dish}, try ${suggestWine(dish)}.`,
});

export function buildSommelierTools(): Capability[] {
  return [winePairing];
}
