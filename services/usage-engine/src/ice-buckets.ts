import {
  ConfigurationError,
  ErrorCode,
  icePctLevels,
  isIcePct,
  type IceBucketMeans,
  type IceFallback,
  type IcePct
} from "@teabase/contracts";

/** Tea-base ml for a no-ice drink when no recipe pins it. */
export const ZERO_ICE_BASE_ML = 550;

export type ManualSample = {
  icePct: number;
  teaBaseMl: number;
};

export type IceBucketAssignment = {
  bucket: IcePct;
  imputed: boolean;
};

/**
 * Mean tea-base ml per ice level from hand-measured pours. Samples at levels
 * outside the bucket set are a configuration error.
 */
export function computeIceBucketMeans(samples: ManualSample[]): IceBucketMeans {
  const sums = new Map<IcePct, { total: number; n: number }>();
  for (const sample of samples) {
    if (!isIcePct(sample.icePct)) {
      throw new ConfigurationError(ErrorCode.INVALID_CONSTANT, `Manual sample ice_pct ${sample.icePct} is not a bucket`);
    }
    if (!Number.isFinite(sample.teaBaseMl) || sample.teaBaseMl <= 0) {
      throw new ConfigurationError(ErrorCode.INVALID_CONSTANT, `Manual sample tea_base_ml must be positive, got ${sample.teaBaseMl}`);
    }
    const acc = sums.get(sample.icePct) ?? { total: 0, n: 0 };
    acc.total += sample.teaBaseMl;
    acc.n += 1;
    sums.set(sample.icePct, acc);
  }

  const means: IceBucketMeans = {};
  for (const pct of icePctLevels) {
    const acc = sums.get(pct);
    if (acc) means[pct] = acc.total / acc.n;
  }
  return means;
}

export function calibratedBuckets(means: IceBucketMeans): IcePct[] {
  return icePctLevels.filter((pct) => means[pct] !== undefined);
}

/**
 * Pick the calibrated bucket for an ice level. 0% always maps to itself
 * (it has its own default volume). Missing ice takes the default level and is
 * flagged imputed; a level without a calibrated mean falls back per policy.
 */
export function assignIceBucket(
  icePct: IcePct | null,
  means: IceBucketMeans,
  fallback: IceFallback,
  defaultIcePct: IcePct
): IceBucketAssignment {
  const value = icePct ?? defaultIcePct;
  const imputed = icePct === null;
  if (value === 0) return { bucket: 0, imputed };

  const keys = calibratedBuckets(means);
  if (keys.includes(value)) return { bucket: value, imputed };

  if (fallback === "error" || keys.length === 0) {
    throw new ConfigurationError(ErrorCode.MISSING_ICE_BUCKET, `No calibrated tea-base volume for ${value}% ice`);
  }
  if (fallback === "lower") {
    const lower = keys.filter((k) => k <= value);
    const bucket = lower.length > 0 ? Math.max(...lower) : Math.min(...keys);
    return { bucket: asBucket(bucket, keys), imputed: true };
  }
  let nearest = keys[0] ?? value;
  for (const key of keys) {
    if (Math.abs(key - value) < Math.abs(nearest - value)) nearest = key;
  }
  return { bucket: nearest, imputed: true };
}

function asBucket(value: number, keys: IcePct[]): IcePct {
  const found = keys.find((k) => k === value);
  if (found === undefined) {
    throw new ConfigurationError(ErrorCode.MISSING_ICE_BUCKET, `No calibrated tea-base volume for ${value}% ice`);
  }
  return found;
}
