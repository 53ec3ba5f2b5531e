import { ValueTransformer } from 'typeorm';

/**
 * pg returns numeric columns as strings to avoid precision loss; amounts here
 * fit comfortably in a double.
 */
export const decimalTransformer: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | number | null) =>
    value === null ? null : typeof value === 'number' ? value : Number(value),
};
