/**
 * How the current process was started.
 * Decided once at the composition root and injected; services never sniff env vars for it.
 */
export type RuntimeMode =
  | { readonly kind: 'cli' }
  | { readonly kind: 'test' };
