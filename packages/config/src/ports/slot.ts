/**
 * "No value" that is distinct from every real value, `null` and `undefined`
 * included. Item defaults and accumulated values are carried as slots.
 */
export type Absent = { readonly kind: "absent" }

export type Present<T> = { readonly kind: "present"; readonly value: T }

export type Slot<T> = Absent | Present<T>
