/**
 * One element of a terminated stream: a value, or exactly one terminal marker
 * after the last value.
 */
export type Notification<T> =
  | { readonly kind: "next"; readonly value: T }
  | { readonly kind: "completed" }
  | { readonly kind: "failed"; readonly error: unknown }
