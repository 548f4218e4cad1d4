import type { ValueTransformer } from 'typeorm';

// pg returns numeric columns as strings
export const decimalTransformer: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | null): number | null =>
    value === null ? null : parseFloat(value),
};

export function roundToCents(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}
