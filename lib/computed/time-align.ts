/**
 * Find the record whose time is closest to `target`.
 *
 * The target is clamped to [times[0], times[last]] first. Between two
 * bracketing samples the nearer one wins; an exact tie goes to the lower
 * index. `times` must be non-decreasing. Returns 0 for an empty vector.
 */
export function findNearestTime(times: readonly number[], target: number): number {
  if (times.length === 0) {
    return 0
  }

  const first = times[0]
  const last = times[times.length - 1]
  const clamped = Math.min(Math.max(target, first), last)

  // Lower bound: first index with times[i] >= clamped
  let lo = 0
  let hi = times.length
  while (lo < hi) {
    const mid = (lo + hi) >>> 1
    if (times[mid] < clamped) {
      lo = mid + 1
    } else {
      hi = mid
    }
  }

  if (lo >= times.length) {
    return times.length - 1
  }
  if (times[lo] === clamped || lo === 0) {
    return lo
  }

  const prevDiff = Math.abs(times[lo - 1] - clamped)
  const nextDiff = Math.abs(times[lo] - clamped)
  return prevDiff <= nextDiff ? lo - 1 : lo
}
