/** `0.456` → `"46%"`. */
export function formatPercent(score: number): string {
  return `${Math.round(score * 100)}%`;
}

/** `250000` → `"£250,000"`. */
export function formatGbp(value: number): string {
  return `£${value.toLocaleString("en-GB", { maximumFractionDigits: 0 })}`;
}
