import type { Priority } from '../types/common.js'

/** Ordinal rank of each priority band, routine lowest */
export const PRIORITY_RANK: Readonly<Record<Priority, number>> = {
  routine: 0,
  soon: 1,
  urgent: 2,
  emergency: 3,
}

/** True when `a` is a strictly higher band than `b`. */
export function outranks(a: Priority, b: Priority): boolean {
  return PRIORITY_RANK[a] > PRIORITY_RANK[b]
}

/** The higher of two bands (the first on a tie). */
export function higherPriority(a: Priority, b: Priority): Priority {
  return outranks(b, a) ? b : a
}
