/**
 * Composite risk score for a document: the mean of per-clause risk counts,
 * rounded to two decimals. An exact half (a mean of 5/8 is 0.625) rounds to
 * the even neighbour, so 0.625 → 0.62 and 1.125 → 1.12.
 *
 * Returns `null` for an empty clause list instead of dividing by zero;
 * callers render it as "Not applicable".
 */
export function compositeRiskScore(counts: readonly number[]): number | null {
  if (counts.length === 0) return null

  const total = counts.reduce((sum, count) => sum + count, 0)
  const scaled = (total * 100) / counts.length
  const lower = Math.floor(scaled)
  if (scaled - lower === 0.5) {
    return (lower % 2 === 0 ? lower : lower + 1) / 100
  }
  return Number((total / counts.length).toFixed(2))
}
