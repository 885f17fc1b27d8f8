import { z } from 'zod';
import { defineCapability, type Capability } from './capability';

export const AVERAGE_TEMPERATURE_F = 75;

export const travelWeather = defineCapability({
  name: 'travel_weather',
  description: 'Takes a city and a month and returns the average temperature for that month.',
  schema: z.object({
    city: z.string().describe('The city for which to get the average temperature.'),
    month: z.string().describe('The month for which to get the average temperature.'),
  }),
  invoke: ({ city, month }) => `The average temperature in ${city} in ${month} is ${AVERAGE_TEMPERATURE_F} degrees.`,
});

export function buildWeatherTools(): Capability[] {
  return [travelWeather];
}
