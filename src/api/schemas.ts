import { Type, Static } from '@sinclair/typebox';

/**
 * Season enum schema
 */
export const SeasonSchema = Type.Union([
  Type.Literal('winter'),
  Type.Literal('spring'),
  Type.Literal('summer'),
  Type.Literal('autumn'),
]);

/**
 * Error response schema
 */
export const ErrorResponseSchema = Type.Object({
  error: Type.String(),
  code: Type.Optional(Type.String()),
  /** Weather API status or client failure code, for UNAVAILABLE_LIVE_READING */
  upstream_code: Type.Optional(Type.Union([Type.String(), Type.Number()])),
});

/**
 * Season catalog response schema
 */
export const SeasonListResponseSchema = Type.Object({
  seasons: Type.Array(SeasonSchema),
});

/**
 * Dataset upload request schema - raw CSV text
 */
export const DatasetUploadRequestSchema = Type.Object({
  csv: Type.String({ minLength: 1 }),
});

/**
 * Dataset upload response schema
 */
export const DatasetUploadResponseSchema = Type.Object({
  dataset_id: Type.String(),
  accepted: Type.Number(),
  failed: Type.Array(
    Type.Object({
      line: Type.Number(),
      reason: Type.String(),
    })
  ),
  cities: Type.Array(Type.String()),
});

export const DatasetParamsSchema = Type.Object({
  dataset_id: Type.String({ minLength: 1 }),
});

export const CityParamsSchema = Type.Object({
  dataset_id: Type.String({ minLength: 1 }),
  city: Type.String({ minLength: 1 }),
});

/**
 * Dataset summary response schema
 */
export const DatasetSummaryResponseSchema = Type.Object({
  dataset_id: Type.String(),
  created_at: Type.Number(),
  reading_count: Type.Number(),
  cities: Type.Array(Type.String()),
});

export const DatasetDeleteResponseSchema = Type.Object({
  deleted: Type.Boolean(),
});

/**
 * Rolling analysis request schema (query params)
 * Range checks happen in the analysis functions so they surface with error codes.
 */
export const AnalysisQuerySchema = Type.Object({
  window: Type.Optional(Type.Number()),
  threshold: Type.Optional(Type.Number()),
});

/**
 * One reading with its rolling baseline
 */
export const BaselinePointSchema = Type.Object({
  city: Type.String(),
  timestamp: Type.Number(),
  season: SeasonSchema,
  temperature: Type.Number(),
  moving_mean: Type.Union([Type.Number(), Type.Null()]),
  moving_std: Type.Union([Type.Number(), Type.Null()]),
  is_anomaly: Type.Boolean(),
});

/**
 * Rolling analysis response schema
 */
export const AnalysisResponseSchema = Type.Object({
  city: Type.String(),
  window: Type.Number(),
  threshold: Type.Number(),
  reading_count: Type.Number(),
  baseline_count: Type.Number(),
  anomaly_count: Type.Number(),
  points: Type.Array(BaselinePointSchema),
});

/**
 * Seasonal statistic schema
 */
export const SeasonalStatSchema = Type.Object({
  city: Type.String(),
  season: SeasonSchema,
  mean: Type.Number(),
  std: Type.Number(),
  sample_count: Type.Number(),
});

export const SeasonalStatsResponseSchema = Type.Object({
  stats: Type.Array(SeasonalStatSchema),
});

/**
 * Live check request schema (query params)
 */
export const LiveQuerySchema = Type.Object({
  season_source: Type.Optional(Type.Union([Type.Literal('latest'), Type.Literal('calendar')])),
  threshold: Type.Optional(Type.Number()),
});

/**
 * Live check response schema
 */
export const LiveResponseSchema = Type.Object({
  city: Type.String(),
  season: SeasonSchema,
  season_source: Type.Union([Type.Literal('latest'), Type.Literal('calendar')]),
  stat: SeasonalStatSchema,
  assessment: Type.Object({
    temperature: Type.Number(),
    lower_bound: Type.Number(),
    upper_bound: Type.Number(),
    in_range: Type.Boolean(),
  }),
});

// TypeScript types derived from schemas
export type ErrorResponse = Static<typeof ErrorResponseSchema>;
export type DatasetUploadResponse = Static<typeof DatasetUploadResponseSchema>;
export type AnalysisResponse = Static<typeof AnalysisResponseSchema>;
export type LiveResponse = Static<typeof LiveResponseSchema>;
