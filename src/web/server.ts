import express, { type Express, type Request, type Response } from 'express';
import { randomUUID } from 'node:crypto';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import type { Server } from 'node:http';
import path from 'node:path';
import { z } from 'zod';
import type { LifecycleManager } from '../core/lifecycle.js';
import { formatIssues, reactorParametersSchema } from '../core/parameters.js';
import { parseTimeSeries, SeriesFormatError } from '../core/series.js';
import type { ExperimentJob, Logger } from '../core/types.js';
import type { UserRepository } from '../db/users.js';
import { currentUser, errorHandler, HttpError, requireAuth } from './http.js';

export interface AppDeps {
  lifecycle: LifecycleManager;
  users: UserRepository;
  uploadsDir: string;
  maxUploadBytes: number;
  logger?: Logger;
}

const loginSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});

const uploadSchema = z.object({
  experiment_name: z.string().trim().min(1),
  tsv_content: z.string().min(1),
  parameters: reactorParametersSchema.optional(),
});

function toView(job: ExperimentJob, maxTries: number) {
  return {
    id: job.id,
    experiment_name: job.experiment_name,
    status: job.status,
    tries: job.tries,
    max_tries: maxTries,
    created_at: job.created_at,
    started_at: job.started_at,
    completed_at: job.completed_at,
    retry_at: job.retry_at,
    error_message: job.error_message,
  };
}

function parseId(raw: string | undefined): number {
  if (raw === undefined || !/^\d+$/.test(raw)) throw new HttpError(404, 'Experiment not found');
  return Number(raw);
}

export function createApp(deps: AppDeps): Express {
  const { lifecycle, users, uploadsDir } = deps;
  const logger = deps.logger ?? console;
  const auth = requireAuth(users);
  mkdirSync(uploadsDir, { recursive: true });

  const app = express();
  app.use(express.json({ limit: deps.maxUploadBytes }));

  function ownedExperiment(req: Request): ExperimentJob {
    const job = lifecycle.get(parseId(req.params.id));
    if (!job) throw new HttpError(404, 'Experiment not found');
    if (job.owner !== currentUser(req)) throw new HttpError(403, 'Access denied');
    return job;
  }

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', message: 'API is running' });
  });

  app.post('/login', (req: Request, res: Response) => {
    const body = loginSchema.safeParse(req.body);
    if (!body.success) throw new HttpError(400, 'Username and password required');

    const userId = users.authenticate(body.data.username, body.data.password);
    if (userId === null) throw new HttpError(401, 'Invalid credentials');

    const session = users.createSession(userId);
    res.json({ token: session.token, expires_at: session.expires_at, message: 'Login successful' });
  });

  app.post('/logout', auth, (req: Request, res: Response) => {
    if (req.sessionToken) users.deleteSession(req.sessionToken);
    res.json({ message: 'Logout successful' });
  });

  app.get('/profile', auth, (req: Request, res: Response) => {
    const profile = users.getProfile(currentUser(req));
    if (!profile) throw new HttpError(404, 'User not found');
    res.json(profile);
  });

  app.post('/reactor/upload', auth, (req: Request, res: Response) => {
    const body = uploadSchema.safeParse(req.body);
    if (!body.success) throw new HttpError(400, formatIssues(body.error));

    try {
      parseTimeSeries(body.data.tsv_content);
    } catch (err) {
      if (err instanceof SeriesFormatError) throw new HttpError(400, err.message);
      throw err;
    }

    const filePath = path.join(uploadsDir, `${randomUUID()}.tsv`);
    writeFileSync(filePath, body.data.tsv_content, 'utf8');

    let job: ExperimentJob;
    try {
      job = lifecycle.create({
        owner: currentUser(req),
        experiment_name: body.data.experiment_name,
        parameters: body.data.parameters ?? {},
        input_series: filePath,
      });
    } catch (err) {
      rmSync(filePath, { force: true });
      throw err;
    }

    logger.log(`[api] experiment ${job.id} queued by user ${job.owner}`);
    res.status(201).json({
      experiment_id: job.id,
      experiment_name: job.experiment_name,
      status: job.status,
      message: 'Experiment uploaded successfully and queued for processing',
    });
  });

  app.get('/reactor/experiments', auth, (req: Request, res: Response) => {
    const experiments = lifecycle.list(currentUser(req)).map((j) => toView(j, lifecycle.config.maxTries));
    res.json({ experiments });
  });

  app.get('/reactor/experiments/:id', auth, (req: Request, res: Response) => {
    const job = ownedExperiment(req);
    res.json({
      experiment: toView(job, lifecycle.config.maxTries),
      parameters: job.parameters,
      results: job.results,
    });
  });

  app.get('/reactor/experiments/:id/results', auth, (req: Request, res: Response) => {
    const job = ownedExperiment(req);
    if (job.status !== 'completed') throw new HttpError(400, 'Experiment is not completed yet');
    res.json({ experiment_id: job.id, results: job.results });
  });

  app.post('/reactor/experiments/:id/retry', auth, (req: Request, res: Response) => {
    const result = lifecycle.retry(parseId(req.params.id), currentUser(req));
    if (!result.ok) {
      const status = result.reason === 'not_found' ? 404 : result.reason === 'forbidden' ? 403 : 400;
      throw new HttpError(status, result.message);
    }
    res.json({ experiment_id: result.job.id, message: 'Experiment reset to pending for retry' });
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });
  app.use(errorHandler(logger));

  return app;
}

export function startServer(app: Express, host: string, port: number, logger: Logger = console): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      logger.log(`🚀 Reactor API running at http://${host}:${port}`);
      resolve(server);
    });
    server.once('error', reject);
  });
}
