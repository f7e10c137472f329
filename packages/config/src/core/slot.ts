import type { Absent, Present, Slot } from "../ports/slot"

export const ABSENT: Absent = Object.freeze({ kind: "absent" })

export function present<T>(value: T): Present<T> {
  return Object.freeze({ kind: "present", value } satisfies Present<T>)
}

export function isPresent<T>(slot: Slot<T>): slot is Present<T> {
  return slot.kind === "present"
}

/** `undefined` means "not given"; every other value, `null` included, is kept. */
export function slotOf<T>(value: T | undefined): Slot<T> {
  return value === undefined ? ABSENT : present(value)
}
