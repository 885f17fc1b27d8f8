import { z } from 'zod';
import { defineCapability, type Capability } from './capability';

const operands = z.object({
  a: z.number().describe('The first operand.'),
  b: z.number().describe('The second operand.'),
});

export const add = defineCapability({
  name: 'add',
  description: 'Adds two numbers and returns the sum.',
  schema: operands,
  invoke: ({ a, b }) => String(a + b),
});

export const subtract = defineCapability({
  name: 'subtract',
  description: 'Subtracts the second number from the first and returns the difference.',
  schema: operands,
  invoke: ({ a, b }) => String(a - b),
});

export const multiply = defineCapability({
  name: 'multiply',
  description: 'Multiplies two numbers and returns the product.',
  schema: operands,
  invoke: ({ a, b }) => String(a * b),
});

export const divide = defineCapability({
  name: 'divide',
  description: 'Divides the first number by the second and returns the quotient.',
  schema: operands,
  invoke: ({ a, b }) => (b === 0 ? 'Cannot divide by zero.' : String(a / b)),
});

export function buildMathTools(): Capability[] {
  return [add, subtract, multiply, divide];
}
