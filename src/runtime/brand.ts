/**
 * Brand helper for "parse, don't validate".
 *
 * A branded string proves it came through a boundary parser (event schema, CLI option,
 * store response) rather than being an arbitrary string that happens to look like an id.
 *
 * String-keyed marker rather than a `unique symbol` so zod schemas that transform into
 * branded types can be exported without TS4023.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
