/**
 * Brand helper for "parse, don't validate".
 *
 * A branded string records which convention a value is known to follow
 * (e.g. a POSIX path vs. a native Windows path). Brands are erased at runtime.
 *
 * NOTE: string-keyed marker rather than a `unique symbol` so exported
 * signatures that mention a brand stay nameable (TS4023).
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
