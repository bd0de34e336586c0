import Fastify, { FastifyServerOptions } from 'fastify';
import { TypeBoxTypeProvider } from '@fastify/type-provider-typebox';
import {
  AnalysisQuerySchema,
  AnalysisResponseSchema,
  CityParamsSchema,
  DatasetDeleteResponseSchema,
  DatasetParamsSchema,
  DatasetSummaryResponseSchema,
  DatasetUploadRequestSchema,
  DatasetUploadResponseSchema,
  ErrorResponseSchema,
  LiveQuerySchema,
  LiveResponseSchema,
  SeasonalStatsResponseSchema,
  SeasonListResponseSchema,
  AnalysisResponse,
  DatasetUploadResponse,
  ErrorResponse,
  LiveResponse,
} from './schemas';
import { resolveWeatherApiKey, toSeasonRule, validateDatasetUpload } from './validation';
import { ANOMALY_THRESHOLD_SIGMA, DEFAULT_WINDOW } from '../config/analysis';
import { OPENWEATHER_API_KEY } from '../config/openweather';
import { SEASONS } from '../config/seasons';
import { MAX_UPLOAD_BYTES } from '../config/server';
import { LiveTemperatureFetcher } from '../types/live';
import { analyzeSeries, summarizeAnalysis } from '../utils/anomaly';
import { getCitySeries, parseTemperatureCsv } from '../utils/dataset';
import {
  AnalysisError,
  AnalysisErrorCode,
  assertThreshold,
  EmptySeriesError,
  UnavailableLiveReadingError,
} from '../utils/errors';
import { evaluateLive, requireLiveTemperature, resolveCurrentSeason } from '../utils/live';
import { aggregateSeasons, getSeasonalStat, listSeasonalStats } from '../utils/seasonal';
import { DatasetStore } from '../utils/store';
import { fetchCurrentTemperature } from '../utils/weather';

const STATUS_BY_CODE: Record<AnalysisErrorCode, number> = {
  INVALID_WINDOW: 400,
  INVALID_THRESHOLD: 400,
  INVALID_DATASET: 400,
  EMPTY_SERIES: 404,
  MISSING_SEASONAL_STAT: 404,
  UNAVAILABLE_LIVE_READING: 502,
};

export interface ServerOptions {
  store?: DatasetStore;
  fetchTemperature?: LiveTemperatureFetcher;
  /** Used when a request has no X-Weather-Api-Key header */
  weatherApiKey?: string;
  logger?: FastifyServerOptions['logger'];
  /** Request body limit in bytes */
  bodyLimit?: number;
  /** Clock for calendar-based season resolution */
  now?: () => Date;
}

function datasetNotFound(datasetId: string): ErrorResponse {
  return { error: `Dataset not found: ${datasetId}`, code: 'DATASET_NOT_FOUND' };
}

export function buildServer(options: ServerOptions = {}) {
  const {
    store = new DatasetStore(),
    fetchTemperature = fetchCurrentTemperature,
    weatherApiKey = OPENWEATHER_API_KEY,
    logger = true,
    bodyLimit = MAX_UPLOAD_BYTES,
    now = () => new Date(),
  } = options;

  const app = Fastify({ logger, bodyLimit }).withTypeProvider<TypeBoxTypeProvider>();

  // Analysis errors are recoverable: map each code to a status and keep the process running
  app.setErrorHandler((error, request, reply) => {
    if (error instanceof AnalysisError) {
      const body: ErrorResponse = { error: error.message, code: error.code };
      if (error instanceof UnavailableLiveReadingError) {
        body.upstream_code = error.upstreamCode;
      }
      request.log.warn({ code: error.code }, error.message);
      return reply.status(STATUS_BY_CODE[error.code]).send(body);
    }

    if (error.validation) {
      return reply.status(400).send({ error: error.message, code: 'INVALID_REQUEST' });
    }

    // Fastify's own client errors (malformed JSON, body too large, bad content type)
    if (error.statusCode && error.statusCode < 500) {
      request.log.warn({ code: error.code }, error.message);
      return reply.status(error.statusCode).send({ error: error.message, code: error.code });
    }

    request.log.error(error);
    return reply.status(500).send({ error: 'Internal server error' });
  });

  /**
   * GET /v1/seasons - Season catalog
   */
  app.get(
    '/v1/seasons',
    {
      schema: {
        response: {
          200: SeasonListResponseSchema,
        },
      },
    },
    async () => {
      return { seasons: SEASONS };
    }
  );

  /**
   * POST /v1/datasets - Upload historical readings as CSV
   *
   * Required columns: city, timestamp, temperature, season.
   * Malformed rows are reported in `failed` and left out of the dataset.
   */
  app.post(
    '/v1/datasets',
    {
      schema: {
        body: DatasetUploadRequestSchema,
        response: {
          200: DatasetUploadResponseSchema,
          400: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const parsed = parseTemperatureCsv(request.body.csv);

      const validation = validateDatasetUpload(parsed);
      if (!validation.valid) {
        return reply.status(400).send({
          error: validation.reason ?? 'Dataset has no valid rows',
          code: 'EMPTY_DATASET',
        });
      }

      const record = store.add(parsed.readings);
      request.log.info(
        { dataset_id: record.id, accepted: parsed.readings.length, failed: parsed.failed.length },
        'Dataset stored'
      );

      const response: DatasetUploadResponse = {
        dataset_id: record.id,
        accepted: parsed.readings.length,
        failed: parsed.failed,
        cities: record.cities,
      };

      return reply.status(200).send(response);
    }
  );

  /**
   * GET /v1/datasets/:dataset_id - Dataset summary
   */
  app.get(
    '/v1/datasets/:dataset_id',
    {
      schema: {
        params: DatasetParamsSchema,
        response: {
          200: DatasetSummaryResponseSchema,
          404: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const { dataset_id } = request.params;
      const record = store.get(dataset_id);

      if (!record) {
        return reply.status(404).send(datasetNotFound(dataset_id));
      }

      return reply.status(200).send({
        dataset_id: record.id,
        created_at: record.created_at,
        reading_count: record.readings.length,
        cities: record.cities,
      });
    }
  );

  /**
   * DELETE /v1/datasets/:dataset_id - Drop a dataset from memory
   */
  app.delete(
    '/v1/datasets/:dataset_id',
    {
      schema: {
        params: DatasetParamsSchema,
        response: {
          200: DatasetDeleteResponseSchema,
          404: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const { dataset_id } = request.params;

      if (!store.delete(dataset_id)) {
        return reply.status(404).send(datasetNotFound(dataset_id));
      }

      return reply.status(200).send({ deleted: true });
    }
  );

  /**
   * GET /v1/datasets/:dataset_id/cities/:city/analysis - Rolling baseline & anomalies
   *
   * For each reading: trailing-window mean / std and whether it falls outside
   * mean ± threshold * std. The first window - 1 readings have no baseline
   * and are never flagged.
   */
  app.get(
    '/v1/datasets/:dataset_id/cities/:city/analysis',
    {
      schema: {
        params: CityParamsSchema,
        querystring: AnalysisQuerySchema,
        response: {
          200: AnalysisResponseSchema,
          400: ErrorResponseSchema,
          404: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const { dataset_id, city } = request.params;
      const { window = DEFAULT_WINDOW, threshold = ANOMALY_THRESHOLD_SIGMA } = request.query;

      const record = store.get(dataset_id);
      if (!record) {
        return reply.status(404).send(datasetNotFound(dataset_id));
      }

      const series = getCitySeries(record.readings, city);
      if (series.length === 0) {
        throw new EmptySeriesError(city);
      }

      const points = analyzeSeries(series, { window, k: threshold });

      const response: AnalysisResponse = {
        city,
        window,
        threshold,
        ...summarizeAnalysis(points),
        points,
      };

      return reply.status(200).send(response);
    }
  );

  /**
   * GET /v1/datasets/:dataset_id/seasons - Seasonal statistics for every city
   */
  app.get(
    '/v1/datasets/:dataset_id/seasons',
    {
      schema: {
        params: DatasetParamsSchema,
        response: {
          200: SeasonalStatsResponseSchema,
          404: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const { dataset_id } = request.params;
      const record = store.get(dataset_id);

      if (!record) {
        return reply.status(404).send(datasetNotFound(dataset_id));
      }

      return reply.status(200).send({ stats: listSeasonalStats(aggregateSeasons(record.readings)) });
    }
  );

  /**
   * GET /v1/datasets/:dataset_id/cities/:city/live - Check the current temperature
   *
   * 1. Resolve the city's current season (latest reading, or calendar)
   * 2. Look up that season's historical mean / std
   * 3. Fetch the live temperature (one call, no retry)
   * 4. In range if mean - threshold * std <= temp <= mean + threshold * std
   */
  app.get(
    '/v1/datasets/:dataset_id/cities/:city/live',
    {
      schema: {
        params: CityParamsSchema,
        querystring: LiveQuerySchema,
        response: {
          200: LiveResponseSchema,
          400: ErrorResponseSchema,
          404: ErrorResponseSchema,
          502: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const { dataset_id, city } = request.params;
      const { season_source = 'latest', threshold = ANOMALY_THRESHOLD_SIGMA } = request.query;

      assertThreshold(threshold);

      const record = store.get(dataset_id);
      if (!record) {
        return reply.status(404).send(datasetNotFound(dataset_id));
      }

      const series = getCitySeries(record.readings, city);
      if (series.length === 0) {
        throw new EmptySeriesError(city);
      }

      const season = resolveCurrentSeason(city, series, toSeasonRule(season_source, now()));
      const stat = getSeasonalStat(aggregateSeasons(record.readings), city, season);

      const apiKey = resolveWeatherApiKey(request.headers['x-weather-api-key'], weatherApiKey);
      if (!apiKey) {
        return reply.status(400).send({
          error: 'Missing weather API key. Provide X-Weather-Api-Key header.',
          code: 'MISSING_API_KEY',
        });
      }

      const live = await fetchTemperature(city, apiKey);
      const temperature = requireLiveTemperature(live);
      const assessment = evaluateLive(temperature, stat, threshold);

      request.log.info({ city, season, temperature, in_range: assessment.in_range }, 'Live temperature checked');

      const response: LiveResponse = { city, season, season_source, stat, assessment };
      return reply.status(200).send(response);
    }
  );

  // Health check endpoint
  app.get('/health', async () => {
    return { status: 'ok' };
  });

  return app;
}
