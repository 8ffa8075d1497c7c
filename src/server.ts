import 'dotenv/config';
import express, { Express, Request, Response } from 'express';
import { AppConfig, ServiceConfig, loadConfig } from './core/config';
import { ConfigError, RequestValidationError, errorMessage } from './core/errors';
import { LeadPipeline } from './core/leadPipeline';
import { writeLeadsFile } from './core/output';
import { normalizeLeadRequest } from './core/requestNormalizer';
import { log } from './utils/logger';

/** Aborts every run still in flight; used on shutdown. */
const activeRuns = new Set<AbortController>();

export const createApp = (pipeline: LeadPipeline, service: ServiceConfig): Express => {
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_, res) => res.json({ ok: true, service: 'lead-harvester', sources: pipeline.sourceNames }));

  app.post('/leads', async (req: Request, res: Response) => {
    if (service.apiKey && req.header('x-api-key') !== service.apiKey) {
      return res.status(401).json({ success: false, error: 'Unauthorized' });
    }

    const started = Date.now();
    const controller = new AbortController();
    activeRuns.add(controller);
    const timer = setTimeout(() => {
      log('WARN', `lead request exceeded ${service.requestTimeoutMs}ms; cancelling`);
      controller.abort();
    }, service.requestTimeoutMs);
    res.on('close', () => {
      if (!res.writableEnded) controller.abort();
    });

    try {
      const request = normalizeLeadRequest(req.body);
      log('INFO', 'lead request accepted', { ...request.query, region: request.regionLabel });
      const { leads, summary } = await pipeline.run(request.query, request.regions, controller.signal);
      const outputFile = await writeLeadsFile(leads, service.outputDir);

      return res.json({
        success: true,
        leadsFound: leads.length,
        leads,
        outputFile,
        summary,
        runtimeSeconds: Number(((Date.now() - started) / 1000).toFixed(2)),
      });
    } catch (error) {
      if (error instanceof RequestValidationError) {
        return res.status(400).json({ success: false, error: error.message });
      }
      log('ERROR', 'lead request failed', errorMessage(error));
      return res.status(500).json({ success: false, error: errorMessage(error) });
    } finally {
      clearTimeout(timer);
      activeRuns.delete(controller);
    }
  });

  return app;
};

const loadConfigOrExit = (): AppConfig => {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      log('ERROR', `invalid configuration (${error.kind})`, error.message);
      process.exit(1);
    }
    throw error;
  }
};

const main = (): void => {
  const config = loadConfigOrExit();
  const pipeline = new LeadPipeline(config.pipeline);
  const { port } = config.service;
  if (!config.service.apiKey) log('WARN', 'API_KEY is not set; POST /leads is unauthenticated');
  const server = createApp(pipeline, config.service).listen(port, () => log('INFO', `lead-harvester listening on ${port}`));

  const shutdown = async (): Promise<void> => {
    log('INFO', `shutting down; cancelling ${activeRuns.size} active run(s)`);
    for (const controller of activeRuns) controller.abort();
    try {
      await pipeline.close();
    } catch (error) {
      log('WARN', 'pipeline close failed', errorMessage(error));
    }
    server.close(() => process.exit(0));
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
};

if (require.main === module) main();
