/**
 * Nominal marker for values that passed a parser at a boundary.
 *
 * A string-keyed marker instead of a `unique symbol` keeps exported zod
 * transforms nameable (TS4023). Erased at runtime.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
