import type { DailyCount } from '@plainsh/core'

/**
 * Width in cells of a bar for `count` when the largest count fills `width`.
 * Any non-zero count gets at least one cell.
 */
export function barWidth(count: number, max: number, width: number): number {
  if (count <= 0 || max <= 0 || width <= 0) return 0
  return Math.max(1, Math.round((count / max) * width))
}

export interface ActivityBar {
  /** `MM-DD` */
  readonly label: string
  readonly count: number
  readonly cells: number
}

export function activityBars(days: ReadonlyArray<DailyCount>, width: number): ReadonlyArray<ActivityBar> {
  const max = Math.max(0, ...days.map((d) => d.count))
  return days.map((d) => ({
    label: d.date.slice(5),
    count: d.count,
    cells: barWidth(d.count, max, width),
  }))
}
