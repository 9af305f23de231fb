/**
 * Percentile with linear interpolation between closest ranks.
 * `sorted` must be ascending.
 */
export function percentile(sorted: readonly number[], p: number): number {
  if (!sorted.length) {
    return 0;
  }
  if (p <= 0) {
    return sorted[0];
  }
  if (p >= 1) {
    return sorted[sorted.length - 1];
  }
  const index = (sorted.length - 1) * p;
  const lower = Math.floor(index);
  const upper = Math.ceil(index);
  if (lower === upper) {
    return sorted[lower];
  }
  const weight = index - lower;
  return sorted[lower] * (1 - weight) + sorted[upper] * weight;
}

export function sortAscending(values: readonly number[]): number[] {
  return [...values].sort((a, b) => a - b);
}

export function quantile(values: readonly number[], p: number): number {
  return percentile(sortAscending(values), p);
}

export function median(values: readonly number[]): number {
  return quantile(values, 0.5);
}

export function mean(values: readonly number[]): number {
  if (!values.length) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Rank values 1..n in ascending order, ties broken by position.
 */
export function rankFirst(values: readonly number[]): number[] {
  const order = values
    .map((value, index) => ({ value, index }))
    .sort((a, b) => a.value - b.value || a.index - b.index);

  const ranks = new Array<number>(values.length);
  order.forEach((entry, position) => {
    ranks[entry.index] = position + 1;
  });
  return ranks;
}

/**
 * Equal-frequency bin edges. Returns null when the edges cannot
 * separate `bins` distinct bins (too few values or repeated edges).
 */
export function quantileEdges(
  values: readonly number[],
  bins: number,
): number[] | null {
  if (values.length < bins) {
    return null;
  }
  const sorted = sortAscending(values);
  const edges: number[] = [];
  for (let i = 0; i <= bins; i++) {
    edges.push(percentile(sorted, i / bins));
  }
  for (let i = 1; i < edges.length; i++) {
    if (!(edges[i] > edges[i - 1])) {
      return null;
    }
  }
  return edges;
}

/**
 * 1-based bin of `value`: bins are right-inclusive and the first bin also
 * takes the lowest edge.
 */
export function binOf(value: number, edges: readonly number[]): number {
  for (let i = 1; i < edges.length; i++) {
    if (value <= edges[i]) {
      return i;
    }
  }
  return edges.length - 1;
}
