import { ValueTransformer } from 'typeorm';

// pg returns numeric columns as strings.
export const numericTransformer: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | null) => (value === null ? null : Number(value)),
};
