import { z } from 'zod';

/**
 * Build an enum-like object, its Zod schema and its literal union from one list
 *
 * @example
 * ```ts
 * const phase = createEnum(['input', 'fetched'] as const);
 * phase.object.FETCHED === 'fetched';
 * type Phase = typeof phase.type; // 'input' | 'fetched'
 * ```
 */
export function createEnum<const T extends readonly [string, ...string[]]>(values: T) {
  const obj = Object.fromEntries(values.map((v) => [v.toUpperCase(), v])) as Record<Uppercase<T[number]>, T[number]>;

  return {
    values,
    object: obj,
    schema: z.enum(values),
    type: null as unknown as T[number],
  };
}
