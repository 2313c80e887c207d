/**
 * Churnline HTTP API Server
 *
 * Features:
 * - Zod request validation (query parameters and JSON bodies)
 * - Standardized APIResponse wrapper
 * - API versioning (/v1/...)
 * - Security and CORS headers, request ID tracking
 * - CSV or JSON uploads with a body size limit
 *
 * Routes:
 *   POST /v1/upload                 validate and stage customer data
 *   POST /v1/run                    run the pipeline (staged or inline data)
 *   GET  /v1/predictions            current batch
 *   GET  /v1/predictions/download   current batch as CSV
 *   GET  /v1/health                 health metrics and scorer availability
 *   GET  /v1/metrics                Prometheus metrics
 *   GET  /v1/model                  scorer and output contract
 *   GET  /v1/sample                 sample customer CSV
 */

import { randomBytes } from 'node:crypto';
import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';
import { z } from 'zod';
import {
  ValidationError,
  errorMessage,
  isBusyError,
  isCancelledError,
  isExecutionError,
  isNotFoundError,
  isValidationError,
  NotFoundError,
  toHttpStatus,
} from '../core/errors.js';
import { RISK_THRESHOLDS } from '../core/batch.js';
import type { RawTable } from '../core/types.js';
import { logger } from '../core/utils/logger.js';
import {
  CANONICAL_ID_COLUMN,
  ID_COLUMN_ALIASES,
  RECOMMENDED_FEATURE_COLUMNS,
} from '../ingestion/columns.js';
import { DEFAULT_SAMPLE_ROWS, MAX_SAMPLE_ROWS, generateSampleTable } from '../ingestion/sample.js';
import { formatCsv, parseCsv, tableFromObjects } from '../ingestion/table.js';
import { DOWNLOAD_COLUMNS, DOWNLOAD_FILE_NAME, formatBatchCsv } from '../pipeline/export.js';
import type { RunMode } from '../pipeline/prediction-pipeline.js';
import { checkScorerAvailability } from '../scoring/availability.js';
import { createChurnlineService, type ChurnlineService, type ServiceSettings } from '../service.js';
import {
  toBatchPayload,
  type APIResponse,
  type ErrorCode,
  type ModelInfo,
  type RunResult,
  type UploadResult,
} from './types.js';

export const API_VERSION = 'v1';
const MAX_RUN_TIMEOUT_MS = 10 * 60 * 1000;

// ============================================================================
// Request validation schemas (Zod)
// ============================================================================

const modeSchema = z.enum(['model', 'demo']);

const runQuerySchema = z.object({
  mode: modeSchema.optional(),
  timeoutMs: z.coerce
    .number()
    .int('timeoutMs must be an integer')
    .positive('timeoutMs must be positive')
    .max(MAX_RUN_TIMEOUT_MS, `timeoutMs must be <= ${MAX_RUN_TIMEOUT_MS}`)
    .optional(),
});

const sampleQuerySchema = z.object({
  rows: z.coerce
    .number()
    .int('rows must be an integer')
    .min(1, 'rows must be >= 1')
    .max(MAX_SAMPLE_ROWS, `rows must be <= ${MAX_SAMPLE_ROWS}`)
    .default(DEFAULT_SAMPLE_ROWS),
});

const cellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
type Cell = z.infer<typeof cellSchema>;

/**
 * JSON body for /upload and /run. Rows are objects keyed by column, or cell
 * arrays aligned with `columns`.
 */
const jsonBodySchema = z.object({
  mode: modeSchema.optional(),
  timeoutMs: z.number().int().positive().max(MAX_RUN_TIMEOUT_MS).optional(),
  columns: z.array(z.string()).optional(),
  rows: z.array(z.union([z.array(cellSchema), z.record(cellSchema)])).optional(),
});

type JsonBody = z.infer<typeof jsonBodySchema>;

// ============================================================================
// Request errors
// ============================================================================

/**
 * Malformed request that never reached the pipeline
 */
class RequestError extends Error {
  constructor(
    public readonly status: number,
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'RequestError';
  }
}

interface ParsedBody {
  readonly table?: RawTable;
  readonly mode?: RunMode;
  readonly timeoutMs?: number;
}

export interface ChurnlineAPIOptions {
  readonly port?: number;
  readonly host?: string;
  readonly corsOrigins?: readonly string[];
  readonly maxBodyBytes?: number;
}

/**
 * HTTP front end for a ChurnlineService
 */
export class ChurnlineAPI {
  private readonly server: Server;
  private readonly port: number;
  private readonly host: string;
  private readonly corsOrigins: readonly string[];
  private readonly maxBodyBytes: number;

  constructor(
    private readonly service: ChurnlineService,
    options: ChurnlineAPIOptions = {}
  ) {
    this.port = options.port ?? 8081;
    this.host = options.host ?? '0.0.0.0';
    this.corsOrigins = options.corsOrigins ?? ['*'];
    this.maxBodyBytes = options.maxBodyBytes ?? 10 * 1024 * 1024;

    this.server = createServer((req, res) => {
      this.handle(req, res).catch((error: unknown) => {
        logger.error('Unhandled request failure', { error: errorMessage(error) });
        if (!res.headersSent) {
          res.writeHead(500);
        }
        res.end();
      });
    });
  }

  /**
   * Start listening. Resolves with the bound address.
   */
  start(): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.port, this.host, () => {
        this.server.off('error', reject);
        const address = this.server.address();
        const info: AddressInfo =
          address !== null && typeof address === 'object'
            ? address
            : { address: this.host, family: 'IPv4', port: this.port };

        logger.info('Churnline API server started', {
          version: API_VERSION,
          url: `http://${info.address}:${info.port}`,
          fallbackEnabled: this.service.pipeline.fallbackEnabled,
        });
        resolve(info);
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.close((error) => {
        this.service.close();
        if (error) {
          reject(error);
          return;
        }
        logger.info('API server stopped');
        resolve();
      });
    });
  }

  /**
   * Handle one request; the server's request listener
   */
  async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const requestId = this.generateRequestId();
    const startTime = performance.now();

    this.setSecurityHeaders(req, res, requestId);

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
    const pathname = url.pathname;
    const method = req.method ?? 'GET';

    try {
      const versionMatch = pathname.match(/^\/(v\d+)\//);
      const requestedVersion = versionMatch?.[1] ?? API_VERSION;
      if (requestedVersion !== API_VERSION) {
        throw new RequestError(
          400,
          'UNSUPPORTED_VERSION',
          `API version ${requestedVersion} not supported. Current version: ${API_VERSION}`
        );
      }

      const basePath = pathname.replace(/^\/v\d+/, '');
      const route = (allowed: string): boolean => {
        if (method === allowed) return true;
        throw new RequestError(405, 'METHOD_NOT_ALLOWED', `${method} not allowed on ${pathname}`);
      };

      if (basePath === '/upload' && route('POST')) {
        await this.handleUpload(req, res, requestId, startTime);
      } else if (basePath === '/run' && route('POST')) {
        await this.handleRun(req, res, url, requestId, startTime);
      } else if (basePath === '/predictions' && route('GET')) {
        this.handlePredictions(res, requestId, startTime);
      } else if (basePath === '/predictions/download' && route('GET')) {
        this.handleDownload(res);
      } else if (basePath === '/health' && route('GET')) {
        await this.handleHealth(res, requestId, startTime);
      } else if (basePath === '/metrics' && route('GET')) {
        this.handleMetrics(res);
      } else if (basePath === '/model' && route('GET')) {
        this.handleModel(res, requestId, startTime);
      } else if (basePath === '/sample' && route('GET')) {
        this.handleSample(res, url);
      } else {
        throw new RequestError(404, 'NOT_FOUND', `Endpoint not found: ${pathname}`);
      }
    } catch (error) {
      this.sendFailure(res, error, requestId, startTime);
    }
  }

  // ==========================================================================
  // Handlers
  // ==========================================================================

  private async handleUpload(
    req: IncomingMessage,
    res: ServerResponse,
    requestId: string,
    startTime: number
  ): Promise<void> {
    const body = await this.parseBody(req);
    if (body.table === undefined) {
      throw new RequestError(400, 'NO_INPUT', 'Request body contains no customer data');
    }

    const staged = this.service.pipeline.stage(body.table);
    const result: UploadResult = {
      records: staged.records.length,
      columns: staged.columns,
      idColumn: staged.idColumn,
      warnings: staged.warnings,
    };
    this.sendSuccessResponse(res, result, requestId, performance.now() - startTime);
  }

  private async handleRun(
    req: IncomingMessage,
    res: ServerResponse,
    url: URL,
    requestId: string,
    startTime: number
  ): Promise<void> {
    const query = runQuerySchema.safeParse(Object.fromEntries(url.searchParams));
    if (!query.success) {
      throw new RequestError(400, 'VALIDATION_FAILED', 'Invalid run parameters', query.error.flatten());
    }

    const body = await this.parseBody(req);
    if (body.table === undefined && this.service.pipeline.stagedTable === null) {
      throw new RequestError(400, 'NO_INPUT', 'No customer data has been uploaded');
    }

    // Client went away before the run finished
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) controller.abort();
    });

    const report = await this.service.pipeline.run(body.table, {
      mode: query.data.mode ?? body.mode ?? 'model',
      timeoutMs: query.data.timeoutMs ?? body.timeoutMs,
      signal: controller.signal,
    });

    const result: RunResult = {
      ...toBatchPayload(report.batch),
      warnings: report.warnings,
      durationMs: report.durationMs,
    };
    res.setHeader('X-Prediction-Source', report.batch.source);
    this.sendSuccessResponse(res, result, requestId, performance.now() - startTime);
  }

  private handlePredictions(res: ServerResponse, requestId: string, startTime: number): void {
    const batch = this.service.store.getCurrent();
    if (batch === null) {
      throw new NotFoundError('No predictions have been computed yet', 'NO_BATCH');
    }
    res.setHeader('X-Prediction-Source', batch.source);
    this.sendSuccessResponse(res, toBatchPayload(batch), requestId, performance.now() - startTime);
  }

  private handleDownload(res: ServerResponse): void {
    const batch = this.service.store.getCurrent();
    if (batch === null) {
      throw new NotFoundError('No predictions have been computed yet', 'NO_BATCH');
    }

    res.writeHead(200, {
      'Content-Type': 'text/csv; charset=utf-8',
      'Content-Disposition': `attachment; filename="${DOWNLOAD_FILE_NAME}"`,
      'X-Prediction-Source': batch.source,
      'X-Batch-Id': batch.batchId,
      'Cache-Control': 'no-store',
    });
    res.end(formatBatchCsv(batch));
  }

  private async handleHealth(res: ServerResponse, requestId: string, startTime: number): Promise<void> {
    const availability = await checkScorerAvailability(this.service.settings.scorer);
    this.service.health.updateScorerAvailability(availability);
    this.sendSuccessResponse(res, this.service.health.getMetrics(), requestId, performance.now() - startTime);
  }

  private handleMetrics(res: ServerResponse): void {
    res.writeHead(200, { 'Content-Type': 'text/plain; version=0.0.4' });
    res.end(this.service.health.exportPrometheus());
  }

  private handleModel(res: ServerResponse, requestId: string, startTime: number): void {
    const { scorer, simulator, pipeline } = this.service.settings;
    const info: ModelInfo = {
      scorer: {
        command: scorer.command,
        args: scorer.args,
        cwd: scorer.cwd ?? null,
        timeoutMs: scorer.timeoutMs,
        channel: 'file',
      },
      input: {
        requiredColumns: [CANONICAL_ID_COLUMN],
        identifierAliases: ID_COLUMN_ALIASES,
        recommendedColumns: RECOMMENDED_FEATURE_COLUMNS,
      },
      output: {
        columns: DOWNLOAD_COLUMNS,
        riskThresholds: { low: RISK_THRESHOLDS.LOW_UPPER, high: RISK_THRESHOLDS.HIGH_LOWER },
      },
      fallback: {
        enabled: pipeline.fallbackEnabled,
        seed: simulator.seed,
        jitter: simulator.jitter,
      },
    };
    this.sendSuccessResponse(res, info, requestId, performance.now() - startTime);
  }

  private handleSample(res: ServerResponse, url: URL): void {
    const query = sampleQuerySchema.safeParse(Object.fromEntries(url.searchParams));
    if (!query.success) {
      throw new RequestError(400, 'VALIDATION_FAILED', 'Invalid sample parameters', query.error.flatten());
    }

    res.writeHead(200, {
      'Content-Type': 'text/csv; charset=utf-8',
      'Content-Disposition': 'attachment; filename="sample_customers.csv"',
    });
    res.end(formatCsv(generateSampleTable(query.data.rows)));
  }

  // ==========================================================================
  // Body parsing
  // ==========================================================================

  private async parseBody(req: IncomingMessage): Promise<ParsedBody> {
    const text = await this.readBody(req);
    if (text.trim() === '') {
      return {};
    }

    const contentType = (req.headers['content-type'] ?? '').split(';')[0]?.trim().toLowerCase() ?? '';
    if (contentType === 'application/json') {
      return this.parseJsonBody(text);
    }
    if (
      contentType === '' ||
      contentType === 'text/csv' ||
      contentType === 'text/plain' ||
      contentType === 'application/octet-stream'
    ) {
      return { table: parseCsv(text) };
    }
    throw new RequestError(
      415,
      'UNSUPPORTED_MEDIA_TYPE',
      `Unsupported content type: ${contentType}. Send text/csv or application/json`
    );
  }

  private async readBody(req: IncomingMessage): Promise<string> {
    const declared = Number(req.headers['content-length'] ?? '0');
    if (declared > this.maxBodyBytes) {
      throw this.payloadTooLarge();
    }

    const chunks: Buffer[] = [];
    let size = 0;
    for await (const chunk of req) {
      const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      size += buffer.length;
      if (size > this.maxBodyBytes) {
        throw this.payloadTooLarge();
      }
      chunks.push(buffer);
    }
    return Buffer.concat(chunks).toString('utf-8');
  }

  private payloadTooLarge(): RequestError {
    return new RequestError(413, 'PAYLOAD_TOO_LARGE', `Request body exceeds ${this.maxBodyBytes} bytes`);
  }

  private parseJsonBody(text: string): ParsedBody {
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new ValidationError('Request body is not valid JSON', [
        { code: 'malformed-input', message: errorMessage(error) },
      ]);
    }

    const parsed = jsonBodySchema.safeParse(json);
    if (!parsed.success) {
      throw new RequestError(400, 'VALIDATION_FAILED', 'Invalid request body', parsed.error.flatten());
    }

    return {
      table: jsonBodyTable(parsed.data),
      mode: parsed.data.mode,
      timeoutMs: parsed.data.timeoutMs,
    };
  }

  // ==========================================================================
  // Responses
  // ==========================================================================

  private setSecurityHeaders(req: IncomingMessage, res: ServerResponse, requestId: string): void {
    const requestOrigin = req.headers.origin;
    const origin = this.corsOrigins.includes('*')
      ? '*'
      : requestOrigin !== undefined && this.corsOrigins.includes(requestOrigin)
        ? requestOrigin
        : (this.corsOrigins[0] ?? 'null');
    res.setHeader('Access-Control-Allow-Origin', origin);
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
    res.setHeader('Access-Control-Expose-Headers', 'X-Request-ID, X-Prediction-Source, X-Batch-Id, Retry-After');

    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none';");
    res.setHeader('Referrer-Policy', 'no-referrer');

    res.setHeader('X-Request-ID', requestId);
    res.setHeader('X-API-Version', API_VERSION);
  }

  private sendSuccessResponse<T>(res: ServerResponse, data: T, requestId: string, latencyMs: number): void {
    const response: APIResponse<T> = {
      success: true,
      data,
      meta: {
        requestId,
        latencyMs: Math.round(latencyMs * 100) / 100,
        version: API_VERSION,
      },
    };

    res.setHeader('Cache-Control', 'no-store');
    res.writeHead(200, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(response, null, 2));
  }

  private sendFailure(res: ServerResponse, error: unknown, requestId: string, startTime: number): void {
    const latencyMs = performance.now() - startTime;

    if (error instanceof RequestError) {
      this.sendErrorResponse(res, error.status, error.code, error.message, requestId, latencyMs, error.details);
      return;
    }

    const status = toHttpStatus(error);
    if (isValidationError(error)) {
      this.sendErrorResponse(res, status, error.code, error.message, requestId, latencyMs, {
        issues: error.issues,
        missingColumns: error.missingColumns,
      });
    } else if (isBusyError(error)) {
      res.setHeader('Retry-After', String(error.retryAfterSeconds));
      this.sendErrorResponse(res, status, error.code, error.message, requestId, latencyMs, {
        retryAfterMs: error.retryAfterMs,
      });
    } else if (isExecutionError(error)) {
      this.sendErrorResponse(res, status, error.code, error.message, requestId, latencyMs, {
        reason: error.reason,
        detail: error.detail,
      });
    } else if (isCancelledError(error)) {
      logger.info('Client disconnected, run cancelled', { requestId });
      this.sendErrorResponse(res, status, error.code, error.message, requestId, latencyMs);
    } else if (isNotFoundError(error)) {
      this.sendErrorResponse(res, status, error.code, error.message, requestId, latencyMs);
    } else {
      logger.error('API request error', {
        requestId,
        error: errorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      this.sendErrorResponse(res, status, 'INTERNAL_ERROR', 'Internal server error', requestId, latencyMs);
    }
  }

  private sendErrorResponse(
    res: ServerResponse,
    status: number,
    code: string,
    message: string,
    requestId: string,
    latencyMs: number,
    details?: unknown
  ): void {
    const response: APIResponse<never> = {
      success: false,
      error: {
        code,
        message,
        details,
      },
      meta: {
        requestId,
        latencyMs: Math.round(latencyMs * 100) / 100,
        version: API_VERSION,
      },
    };

    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(response, null, 2));
  }

  private generateRequestId(): string {
    return `req_${randomBytes(16).toString('hex')}`;
  }
}

function cellText(value: Cell | undefined): string {
  if (value === null || value === undefined) return '';
  return String(value);
}

function jsonBodyTable(body: JsonBody): RawTable | undefined {
  if (body.rows === undefined) return undefined;
  const rows = body.rows;

  if (body.columns !== undefined) {
    const columns = body.columns;
    return {
      columns,
      rows: rows.map((row) =>
        Array.isArray(row) ? row.map(cellText) : columns.map((column) => cellText(row[column]))
      ),
    };
  }

  const objects: Record<string, Cell>[] = [];
  for (const row of rows) {
    if (Array.isArray(row)) {
      throw new ValidationError('Array rows need a columns list', [
        { code: 'malformed-input', message: 'Rows given as arrays require a "columns" field' },
      ]);
    }
    objects.push(row);
  }
  return tableFromObjects(objects);
}

/**
 * Build the service and API from resolved settings
 */
export function createChurnlineAPI(settings: ServiceSettings, options: ChurnlineAPIOptions = {}): ChurnlineAPI {
  return new ChurnlineAPI(createChurnlineService(settings), options);
}
