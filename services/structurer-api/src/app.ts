/**
 * Structurer API
 *
 * GET  /              - Upload form
 * POST /process       - Runs the pipeline, renders preview and download link
 * POST /api/extract   - Runs the pipeline, responds with the .xlsx file
 */

import express, { Request, Response, NextFunction } from 'express';
import { ulid } from 'ulid';
import {
  logger,
  config,
  runWithContext,
  setDocumentName,
  describeError,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  ExtractionError,
  ExtractionClientError,
  RenderError,
  type ErrorEnvelope,
  type HealthResponse,
} from '@doc-structurer/shared';
import { processDocument, type PipelineDependencies } from './lib/pipeline';
import { parseDocumentUpload, UploadError, type DocumentUpload } from './lib/upload';
import { renderUploadPage, toDownloadHref } from './views/pages';

export interface AppOptions {
  pipeline?: Partial<PipelineDependencies>;
  maxUploadBytes?: number;
  outputFileName?: string;
}

type ValidUpload = { apiKey: string; file: NonNullable<DocumentUpload['file']> };

const MISSING_API_KEY = 'Please enter your OpenAI API Key to proceed.';
const MISSING_FILE = 'Please upload a PDF document to proceed.';

function checkUpload(upload: DocumentUpload): ValidUpload | string {
  if (!upload.file || upload.file.data.length === 0) return MISSING_FILE;
  if (upload.apiKey.trim() === '') return MISSING_API_KEY;
  return { apiKey: upload.apiKey, file: upload.file };
}

function errorStatus(error: unknown): { status: number; code: string } {
  if (error instanceof UploadError) return { status: 400, code: 'invalid_request' };
  if (error instanceof ExtractionError) return { status: 422, code: error.code };
  if (error instanceof ExtractionClientError) {
    return { status: error.status === 401 ? 401 : 502, code: error.code };
  }
  if (error instanceof RenderError) return { status: 500, code: error.code };
  return { status: 500, code: 'internal_error' };
}

export function createApp(options: AppOptions = {}): express.Express {
  const app = express();
  const maxUploadBytes = options.maxUploadBytes ?? config.maxUploadBytes;

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const correlationId = req.header('x-correlation-id') || ulid();
    res.setHeader('X-Correlation-Id', correlationId);

    runWithContext({ correlationId }, () => {
      next();
    });
  });

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const path = req.route?.path || req.path;

      httpRequestDurationHistogram.observe(
        { method: req.method, path, status: res.statusCode.toString() },
        duration
      );
      httpRequestsCounter.inc({
        method: req.method,
        path,
        status: res.statusCode.toString(),
      });

      logger.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  // Health check
  app.get('/health', (req: Request, res: Response) => {
    const body: HealthResponse = {
      status: 'healthy',
      service: 'structurer-api',
      timestamp: new Date().toISOString(),
    };
    res.json(body);
  });

  // Metrics endpoint
  app.get('/metrics', async (req: Request, res: Response) => {
    res.setHeader('Content-Type', getMetricsContentType());
    res.send(await getMetrics());
  });

  app.get('/', (req: Request, res: Response) => {
    res.type('html').send(renderUploadPage());
  });

  /**
   * POST /process
   * Form submission from the upload page; always answers with the page.
   */
  app.post('/process', async (req: Request, res: Response) => {
    try {
      const upload = checkUpload(await parseDocumentUpload(req, maxUploadBytes));
      if (typeof upload === 'string') {
        res.status(400).type('html').send(renderUploadPage({ warning: upload }));
        return;
      }

      setDocumentName(upload.file.filename);

      const output = await processDocument(
        { pdf: upload.file.data, apiKey: upload.apiKey, fileName: options.outputFileName },
        options.pipeline
      );

      res.type('html').send(
        renderUploadPage({
          result: {
            fileName: output.fileName,
            downloadHref: toDownloadHref(output.spreadsheet, output.mimeType),
            records: output.records,
            recordCount: output.records.length,
            pageCount: output.pageCount,
          },
        })
      );
    } catch (error) {
      const { status } = errorStatus(error);
      res
        .status(status)
        .type('html')
        .send(
          renderUploadPage({
            error: `An error occurred during processing: ${describeError(error)}`,
          })
        );
    }
  });

  /**
   * POST /api/extract
   * Same pipeline for programmatic callers; answers with the workbook itself.
   */
  app.post('/api/extract', async (req: Request, res: Response) => {
    const correlationId = String(res.getHeader('X-Correlation-Id') ?? '');

    const sendError = (status: number, code: string, message: string) => {
      const envelope: ErrorEnvelope = {
        error: { code, message, correlation_id: correlationId },
      };
      res.status(status).json(envelope);
    };

    try {
      const upload = checkUpload(await parseDocumentUpload(req, maxUploadBytes));
      if (typeof upload === 'string') {
        sendError(400, 'invalid_request', upload);
        return;
      }

      setDocumentName(upload.file.filename);

      const output = await processDocument(
        { pdf: upload.file.data, apiKey: upload.apiKey, fileName: options.outputFileName },
        options.pipeline
      );

      res.status(200);
      res.attachment(output.fileName);
      res.setHeader('Content-Type', output.mimeType);
      res.setHeader('Content-Length', output.spreadsheet.length.toString());
      res.setHeader('X-Record-Count', output.records.length.toString());
      res.end(output.spreadsheet);
    } catch (error) {
      const { status, code } = errorStatus(error);
      sendError(status, code, describeError(error));
    }
  });

  return app;
}
