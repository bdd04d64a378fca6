export interface ColumnStatistics {
  mean: number
  /** Sample standard deviation (n - 1); 0 with fewer than two samples */
  stdev: number
  min: number
  max: number
  range: number
}

const EMPTY_STATISTICS: ColumnStatistics = { mean: 0, stdev: 0, min: 0, max: 0, range: 0 }

/**
 * Whole-column statistics over the finite samples of one channel.
 * Missing cells and NaN/Infinity are skipped.
 */
export function computeColumnStatistics(data: readonly (readonly number[])[], column: number): ColumnStatistics {
  let count = 0
  let sum = 0
  let min = Infinity
  let max = -Infinity

  for (const row of data) {
    const value = row[column]
    if (typeof value !== "number" || !Number.isFinite(value)) continue
    count++
    sum += value
    if (value < min) min = value
    if (value > max) max = value
  }

  if (count === 0) {
    return EMPTY_STATISTICS
  }

  const mean = sum / count

  let squares = 0
  for (const row of data) {
    const value = row[column]
    if (typeof value !== "number" || !Number.isFinite(value)) continue
    squares += (value - mean) ** 2
  }

  const stdev = count > 1 ? Math.sqrt(squares / (count - 1)) : 0

  return { mean, stdev, min, max, range: max - min }
}
