export interface ConfidenceInterval {
  level: number;
  lower: number;
  upper: number;
}

export interface DistributionSummary {
  mean: number;
  median: number;
  std: number;
  /** std / |mean|; 0 when the mean is 0. */
  coefficientOfVariation: number;
  skewness: number;
  /** Excess kurtosis (0 for a normal distribution). */
  kurtosis: number;
  min: number;
  max: number;
  range: number;
  confidenceIntervals: ConfidenceInterval[];
}

export const CONFIDENCE_LEVELS = [90, 95, 99] as const;

export const mean = (values: readonly number[]): number =>
  values.length === 0 ? 0 : values.reduce((total, value) => total + value, 0) / values.length;

/** Population standard deviation. */
export const standardDeviation = (values: readonly number[]): number => {
  if (values.length === 0) {
    return 0;
  }
  const average = mean(values);
  return Math.sqrt(mean(values.map((value) => (value - average) ** 2)));
};

/** Percentile of pre-sorted values with linear interpolation between closest ranks. */
export const percentileOfSorted = (sorted: readonly number[], percent: number): number => {
  if (sorted.length === 0) {
    return 0;
  }
  const position = ((sorted.length - 1) * percent) / 100;
  const lowerIndex = Math.floor(position);
  const upperIndex = Math.ceil(position);
  const lower = sorted[lowerIndex] ?? 0;
  const upper = sorted[upperIndex] ?? lower;
  return lower + (upper - lower) * (position - lowerIndex);
};

export const percentile = (values: readonly number[], percent: number): number =>
  percentileOfSorted([...values].sort((a, b) => a - b), percent);

export const median = (values: readonly number[]): number => percentile(values, 50);

/** Fraction of values less than or equal to the threshold; 0 for no values. */
export const shareAtOrBelow = (values: readonly number[], threshold: number): number =>
  values.length === 0 ? 0 : values.filter((value) => value <= threshold).length / values.length;

const centralMoment = (values: readonly number[], average: number, order: number): number =>
  mean(values.map((value) => (value - average) ** order));

export const summarizeDistribution = (values: readonly number[]): DistributionSummary => {
  const sorted = [...values].sort((a, b) => a - b);
  const average = mean(sorted);
  const std = standardDeviation(sorted);
  const variance = std * std;
  const min = sorted[0] ?? 0;
  const max = sorted[sorted.length - 1] ?? 0;

  return {
    mean: average,
    median: percentileOfSorted(sorted, 50),
    std,
    coefficientOfVariation: average === 0 ? 0 : std / Math.abs(average),
    skewness: variance === 0 ? 0 : centralMoment(sorted, average, 3) / variance ** 1.5,
    kurtosis: variance === 0 ? 0 : centralMoment(sorted, average, 4) / variance ** 2 - 3,
    min,
    max,
    range: max - min,
    confidenceIntervals: CONFIDENCE_LEVELS.map((level) => {
      const tail = (100 - level) / 2;
      return {
        level,
        lower: percentileOfSorted(sorted, tail),
        upper: percentileOfSorted(sorted, 100 - tail),
      };
    }),
  };
};
