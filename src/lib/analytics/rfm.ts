/**
 * RFM Scoring
 *
 * Scores every customer 1-5 on Recency, Frequency and Monetary value using
 * equal-frequency bins computed independently per metric:
 * - Recency: fewer days since the last purchase scores higher
 * - Frequency: distinct orders, rank-transformed first so that the many
 *   customers sharing the same small count still spread across bins
 * - Monetary: lifetime revenue
 *
 * A metric that cannot be split into five bins scores 3 for everybody and
 * flags the whole result as degraded.
 */

import { addDays, differenceInDays } from "date-fns";
import { buildCustomerProfiles } from "./snapshots";
import { binOf, quantileEdges, rankFirst } from "./stats";
import type { NormalizedDataset } from "./types";

export type RfmMetric = "recency" | "frequency" | "monetary";

export type RfmSegment =
  | "Champions"
  | "Loyal Customers"
  | "Potential Loyalists"
  | "New Customers"
  | "At Risk"
  | "Hibernating"
  | "About to Sleep"
  | "Need Attention";

/**
 * One customer's scores. When any metric is degraded `segmentCode` is "333"
 * for everybody, while `rfmTotal` and `segment` still come from the scores
 * actually assigned (the degraded metric at 3, the others binned), so the
 * code and the total need not agree.
 */
export interface RfmRecord {
  customerId: string;
  recencyDays: number | null; // null when no purchase date is known
  frequency: number;
  monetary: number;
  lastPurchaseDate: Date | null;
  rScore: number; // 1-5, 5 is most recent
  fScore: number; // 1-5, 5 is most frequent
  mScore: number; // 1-5, 5 is highest spend
  segmentCode: string; // e.g. "545"
  rfmTotal: number; // 3-15
  segment: RfmSegment;
}

export interface RfmResult {
  referenceDate: Date | null;
  records: RfmRecord[];
  rfmDegraded: boolean;
  degradedMetrics: RfmMetric[];
  /** Bin edges per metric (ranks for frequency), null when degraded */
  edges: Record<RfmMetric, number[] | null>;
  segmentDistribution: Partial<Record<RfmSegment, number>>;
}

export interface RfmOptions {
  /** Defaults to one day after the latest transaction */
  referenceDate?: Date;
}

export const RFM_BINS = 5;
export const NEUTRAL_SCORE = 3;
export const NEUTRAL_SEGMENT_CODE = "333";

type ScoreTriple = { r: number; f: number; m: number };

/**
 * Segment rules, first match wins.
 */
export const SEGMENT_RULES: ReadonlyArray<{
  segment: RfmSegment;
  matches: (scores: ScoreTriple) => boolean;
}> = [
  { segment: "Champions", matches: ({ r, f, m }) => r >= 4 && f >= 4 && m >= 4 },
  { segment: "Loyal Customers", matches: ({ f, m }) => f >= 4 && m >= 4 },
  { segment: "Potential Loyalists", matches: ({ r, f }) => r >= 4 && f >= 2 && f <= 4 },
  { segment: "New Customers", matches: ({ r, f }) => r >= 4 && f <= 2 },
  { segment: "At Risk", matches: ({ r, f }) => r <= 2 && f >= 3 },
  { segment: "Hibernating", matches: ({ r, f, m }) => r <= 2 && f <= 2 && m <= 2 },
  { segment: "About to Sleep", matches: ({ r, f }) => r <= 2 && f <= 2 },
];

export function getRfmSegment(scores: ScoreTriple): RfmSegment {
  return SEGMENT_RULES.find((rule) => rule.matches(scores))?.segment ?? "Need Attention";
}

/**
 * Score customers. `higherIsBetter` false flips the bins (recency).
 * Returns null when the values cannot support five distinct bins.
 */
function scoreMetric(
  values: readonly number[],
  higherIsBetter: boolean,
): { scores: number[]; edges: number[] } | null {
  const edges = quantileEdges(values, RFM_BINS);
  if (!edges) {
    return null;
  }
  const scores = values.map((value) => {
    const bin = binOf(value, edges);
    return higherIsBetter ? bin : RFM_BINS + 1 - bin;
  });
  return { scores, edges };
}

/**
 * Compute RFM records for every customer in the dataset.
 */
export function scoreRfm(
  dataset: NormalizedDataset,
  options: RfmOptions = {},
): RfmResult {
  const referenceDate =
    options.referenceDate ??
    (dataset.maxTimestamp ? addDays(dataset.maxTimestamp, 1) : null);

  const customers = [...buildCustomerProfiles(dataset).values()];

  const recencies = customers.map((customer) =>
    referenceDate && customer.lastPurchaseDate
      ? differenceInDays(referenceDate, customer.lastPurchaseDate)
      : null,
  );
  const frequencies = customers.map((customer) => customer.orderIds.size);
  const monetaries = customers.map((customer) => customer.revenue);

  // Customers without a known purchase date do not shape the recency bins
  const knownRecency = recencies.flatMap((value, index) =>
    value === null ? [] : [{ index, value }],
  );
  const recency = scoreMetric(
    knownRecency.map((entry) => entry.value),
    false,
  );
  const recencyScores = new Map<number, number>();
  if (recency) {
    knownRecency.forEach((entry, position) => {
      recencyScores.set(entry.index, recency.scores[position]);
    });
  }

  const frequency = scoreMetric(rankFirst(frequencies), true);
  const monetary = scoreMetric(monetaries, true);

  const degradedMetrics: RfmMetric[] = [];
  if (!recency) degradedMetrics.push("recency");
  if (!frequency) degradedMetrics.push("frequency");
  if (!monetary) degradedMetrics.push("monetary");
  const rfmDegraded = degradedMetrics.length > 0;

  const segmentDistribution: Partial<Record<RfmSegment, number>> = {};

  const records: RfmRecord[] = customers.map((customer, index) => {
    const rScore = recency ? recencyScores.get(index) ?? 1 : NEUTRAL_SCORE;
    const fScore = frequency ? frequency.scores[index] : NEUTRAL_SCORE;
    const mScore = monetary ? monetary.scores[index] : NEUTRAL_SCORE;
    const segment = getRfmSegment({ r: rScore, f: fScore, m: mScore });
    segmentDistribution[segment] = (segmentDistribution[segment] ?? 0) + 1;

    return {
      customerId: customer.customerId,
      recencyDays: recencies[index],
      frequency: frequencies[index],
      monetary: monetaries[index],
      lastPurchaseDate: customer.lastPurchaseDate,
      rScore,
      fScore,
      mScore,
      segmentCode: rfmDegraded
        ? NEUTRAL_SEGMENT_CODE
        : `${rScore}${fScore}${mScore}`,
      rfmTotal: rScore + fScore + mScore,
      segment,
    };
  });

  return {
    referenceDate,
    records,
    rfmDegraded,
    degradedMetrics,
    edges: {
      recency: recency?.edges ?? null,
      frequency: frequency?.edges ?? null,
      monetary: monetary?.edges ?? null,
    },
    segmentDistribution,
  };
}
