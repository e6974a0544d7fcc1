/**
 * Best-effort forecast of a series' next value.
 *
 * The predictor is chosen once from configuration (KPI_PREDICTOR) rather
 * than probed at call time. Nothing downstream depends on a forecast
 * being available; every implementation may return null.
 */

export const PREDICTOR_KINDS = ['linear', 'smoothing', 'none'] as const;

export type PredictorKind = typeof PREDICTOR_KINDS[number];

export interface TrendPredictor {
  readonly name: PredictorKind;
  /** Forecast for the position right after the last value */
  predictNext(values: Array<number | null>): number | null;
}

/** Observations with their position in the series; nulls are dropped */
function observed(values: Array<number | null>): Array<{ x: number; y: number }> {
  const points: Array<{ x: number; y: number }> = [];
  values.forEach((y, x) => {
    if (y !== null && isFinite(y)) points.push({ x, y });
  });
  return points;
}

/** Ordinary least squares with the period index as the single feature */
export class LinearTrendPredictor implements TrendPredictor {
  readonly name = 'linear' as const;

  predictNext(values: Array<number | null>): number | null {
    const points = observed(values);
    const n = points.length;
    if (n < 2) return null;

    const sumX = points.reduce((a, p) => a + p.x, 0);
    const sumY = points.reduce((a, p) => a + p.y, 0);
    const sumXY = points.reduce((a, p) => a + p.x * p.y, 0);
    const sumX2 = points.reduce((a, p) => a + p.x * p.x, 0);

    const denom = n * sumX2 - sumX * sumX;
    if (denom === 0) return null;

    const slope = (n * sumXY - sumX * sumY) / denom;
    const intercept = (sumY - slope * sumX) / n;
    const forecast = slope * values.length + intercept;
    return isFinite(forecast) ? forecast : null;
  }
}

export class ExponentialSmoothingPredictor implements TrendPredictor {
  readonly name = 'smoothing' as const;

  constructor(private readonly alpha: number = 0.3) {
    if (alpha <= 0 || alpha > 1) {
      throw new RangeError(`alpha must be in (0, 1], got ${alpha}`);
    }
  }

  predictNext(values: Array<number | null>): number | null {
    const points = observed(values);
    if (points.length < 2) return null;

    let level = points[0].y;
    for (let i = 1; i < points.length; i++) {
      level = this.alpha * points[i].y + (1 - this.alpha) * level;
    }
    return level;
  }
}

export class NoPredictor implements TrendPredictor {
  readonly name = 'none' as const;

  predictNext(): number | null {
    return null;
  }
}

export function createPredictor(kind: PredictorKind): TrendPredictor {
  switch (kind) {
    case 'linear':
      return new LinearTrendPredictor();
    case 'smoothing':
      return new ExponentialSmoothingPredictor();
    case 'none':
      return new NoPredictor();
  }
}
