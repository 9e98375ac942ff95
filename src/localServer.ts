import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import type { ServerConfig } from './core/env.js';
import { Errors, RequestValidationError } from './core/errors.js';
import { createModuleLogger } from './core/logger.js';
import type { Finding } from './core/types.js';
import { parseFinding, parseSummarizeRequest } from './core/validation.js';
import type { SummarizationService } from './services/summarizationService.js';

const log = createModuleLogger('localServer');

/**
 * Findings from a newline-delimited JSON body. Blank lines are skipped; more
 * than `maxFindings` findings fails with 413.
 */
export async function* readNdjsonFindings(input: Readable, maxFindings: number): AsyncGenerator<Finding> {
  const lines = createInterface({ input, crlfDelay: Infinity });
  let lineNo = 0;
  let count = 0;
  for await (const line of lines) {
    lineNo++;
    if (!line.trim()) continue;
    if (++count > maxFindings) {
      throw new RequestValidationError(Errors.payloadTooLarge(`${maxFindings} findings`), 413);
    }

    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch {
      throw new RequestValidationError(Errors.invalidFormat(`line ${lineNo}`, 'Expected one JSON finding per line'));
    }
    yield parseFinding(value, `line ${lineNo}`);
  }
}

function sendError(res: express.Response, error: unknown, context: string, scanId?: string): void {
  if (error instanceof RequestValidationError) {
    res.status(error.status).json(error.apiError);
    return;
  }
  // Full error stays in the logs
  log.error({ err: error, context, scanId }, 'Request failed');
  res.status(500).json(Errors.summaryFailed(`${context} - please try again`, scanId));
}

/**
 * 4xx status carried by a body-parser error, if any
 */
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

export function createApp(service: SummarizationService, config: ServerConfig): express.Express {
  const app = express();

  app.use(helmet());
  app.use(cors(config.allowedOrigins.length > 0 ? { origin: config.allowedOrigins } : undefined));

  const summarizeRateLimiter = rateLimit({
    windowMs: config.rateLimitWindowMs,
    limit: config.rateLimitMaxRequests,
    message: Errors.rateLimited(),
    standardHeaders: true,
    legacyHeaders: false,
  });

  app.post(
    '/api/summarize',
    summarizeRateLimiter,
    express.json({ limit: config.jsonBodyLimit }),
    async (req, res) => {
      let scanId: string | undefined;
      try {
        const request = parseSummarizeRequest(req.body);
        scanId = request.scanId;
        const report = await service.summarize(request);
        res.json(report);
      } catch (error) {
        sendError(res, error, 'Summarization failed', scanId);
      }
    }
  );

  app.post('/api/summarize/stream', summarizeRateLimiter, async (req, res) => {
    try {
      const report = await service.summarizeStream(readNdjsonFindings(req, config.maxStreamFindings));
      res.json(report);
    } catch (error) {
      sendError(res, error, 'Streaming summarization failed');
    }
  });

  // Body-parser failures from express.json() surface here
  app.use((err: unknown, _req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json(Errors.invalidFormat('body', 'Expected a JSON object'));
      return;
    }
    const status = clientErrorStatus(err);
    if (status === 413) {
      res.status(413).json(Errors.payloadTooLarge(config.jsonBodyLimit));
      return;
    }
    if (status !== undefined) {
      const reason = err instanceof Error ? err.message : 'Unreadable request body';
      res.status(status).json(Errors.invalidFormat('body', reason));
      return;
    }
    sendError(res, err, 'Request failed');
  });

  return app;
}
