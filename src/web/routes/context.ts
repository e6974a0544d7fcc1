import type { AnalysisCache } from '../../core/analysis-cache.js';
import type { AnalysisResult } from '../../core/types.js';
import type { TrendPredictor } from '../../processing/predictors.js';

/** Dependencies shared by all routes; built once per server */
export interface RouteContext {
  predictor: TrendPredictor;
  cache: AnalysisCache<AnalysisResult>;
  topN: number;
}
