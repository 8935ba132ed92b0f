import { Router, type Request, type Response } from 'express';
import type { UploadedFile } from 'express-fileupload';
import rateLimit from 'express-rate-limit';
import { z } from 'zod';

import {
  toJobRecordData,
  type ApiEnvelope,
  type JobControlData,
  type JobInfoData,
  type QueueStatusData,
  type SendFaxData,
} from '../contracts/fax';
import { JOB_CONTROL_ACTIONS, controlJob, type JobControlAction } from '../fax/control';
import { marshalSubmissionOptions, unrecognizedOptionKeys } from '../fax/options';
import { findJob, parseQueueType, queryJobs } from '../fax/queues';
import { withFaxSession, type SessionOutcome, type SessionOptions } from '../fax/session';
import { submitFax } from '../fax/submission';
import type { FaxBackend } from '../fax/types';
import { isAllowedDocument, type UploadStore } from '../storage/uploads';

export interface FaxRouteDeps {
  backend: FaxBackend;
  uploads: UploadStore;
  host: string;
  username?: string;
  queryMaxJobs: number;
  sendRateLimit: number;
  sendWindowMs: number;
}

const formFieldsSchema = z.object({
  destinations: z.string().optional(),
  options: z.string().optional(),
});

const destinationsSchema = z.array(z.string().trim().min(1));

const optionsSchema = z.record(z.string(), z.unknown());

const CONTROL_MESSAGES: Record<JobControlAction, string> = {
  kill: 'Job killed successfully',
  suspend: 'Job suspended successfully',
  resume: 'Job resumed successfully',
  wait: 'Job completed successfully',
};

export function respond<T extends object>(
  res: Response,
  status: number,
  success: boolean,
  message: string,
  data?: T,
): void {
  const body: ApiEnvelope<T> = { success, message, data: data ?? {} };
  res.status(status).json(body);
}

function respondUnavailable(res: Response, outcome: Extract<SessionOutcome<unknown>, { ok: false }>): void {
  const prefix = outcome.stage === 'connect' ? 'Connection failed' : 'Login failed';
  console.warn(`[Fax] ${prefix}: ${outcome.message}`);
  respond(res, 503, false, `${prefix}: ${outcome.message}`);
}

/** Aborts when the client goes away before we answered, abandoning the backend session. */
function clientGoneSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) controller.abort();
  });
  return controller.signal;
}

function parseJson(raw: string): { ok: true; value: unknown } | { ok: false } {
  try {
    const value: unknown = JSON.parse(raw);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

function uploadedFiles(req: Request): UploadedFile[] {
  const field = req.files?.files;
  if (!field) return [];
  return Array.isArray(field) ? field : [field];
}

export function faxRoutes(deps: FaxRouteDeps): Router {
  const router = Router();

  const sessionOptions = (res: Response): SessionOptions => ({
    host: deps.host,
    username: deps.username,
    signal: clientGoneSignal(res),
  });

  const sendLimiter = rateLimit({
    windowMs: deps.sendWindowMs,
    limit: deps.sendRateLimit,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req, res) => {
      respond(res, 429, false, 'Too many requests');
    },
  });

  // Send a fax
  router.post('/send', sendLimiter, async (req: Request, res: Response) => {
    const files = uploadedFiles(req);
    if (files.length === 0) {
      respond(res, 400, false, 'No files provided');
      return;
    }
    if (files.every((file) => !file.name)) {
      respond(res, 400, false, 'No files selected');
      return;
    }
    if (files.some((file) => file.truncated)) {
      respond(res, 413, false, 'File too large');
      return;
    }

    const fields = formFieldsSchema.safeParse(req.body ?? {});
    if (!fields.success) {
      respond(res, 400, false, 'Invalid form fields');
      return;
    }

    const destinationsJson = parseJson(fields.data.destinations ?? '[]');
    const destinations = destinationsJson.ok ? destinationsSchema.safeParse(destinationsJson.value) : null;
    if (!destinations?.success) {
      respond(res, 400, false, 'Invalid destinations format');
      return;
    }
    if (destinations.data.length === 0) {
      respond(res, 400, false, 'No destinations specified');
      return;
    }

    const optionsJson = parseJson(fields.data.options ?? '{}');
    const rawOptions = optionsJson.ok ? optionsSchema.safeParse(optionsJson.value) : null;
    if (!rawOptions?.success) {
      respond(res, 400, false, 'Invalid options format');
      return;
    }

    const accepted = files.filter((file) => file.name && isAllowedDocument(file.name));
    if (accepted.length === 0) {
      respond(res, 400, false, 'No valid files uploaded');
      return;
    }

    const ignored = unrecognizedOptionKeys(rawOptions.data);
    if (ignored.length > 0) {
      console.warn(`[Fax] Ignoring unknown options: ${ignored.join(', ')}`);
    }
    const options = marshalSubmissionOptions(rawOptions.data);

    const staged: string[] = [];
    try {
      for (const file of accepted) {
        staged.push(await deps.uploads.stage({ name: file.name, data: file.data }));
      }

      const outcome = await withFaxSession(deps.backend, sessionOptions(res), (session) =>
        submitFax(session, staged, destinations.data, options),
      );
      if (!outcome.ok) {
        respondUnavailable(res, outcome);
        return;
      }

      const result = outcome.value;
      if (!result.success) {
        console.warn(`[Fax] Submission rejected: ${result.errorMessage || '(no detail)'}`);
        respond(res, 400, false, result.errorMessage);
        return;
      }
      console.log(`[Fax] Submitted job ${result.jobId} to ${destinations.data.length} destination(s)`);
      respond<SendFaxData>(res, 200, true, 'Fax submitted successfully', {
        job_id: result.jobId,
        group_id: result.groupId,
        total_pages: result.totalPages,
      });
    } finally {
      await deps.uploads.releaseAll(staged);
    }
  });

  // List one queue
  router.get('/status', async (req: Request, res: Response) => {
    const rawQueue = req.query.queue;
    const queue = rawQueue === undefined ? 'send' : typeof rawQueue === 'string' ? parseQueueType(rawQueue) : null;
    if (!queue) {
      respond(res, 400, false, 'Invalid queue type');
      return;
    }

    const outcome = await withFaxSession(deps.backend, sessionOptions(res), (session) =>
      queryJobs(session, queue, { maxCount: deps.queryMaxJobs }),
    );
    if (!outcome.ok) {
      respondUnavailable(res, outcome);
      return;
    }
    if (!outcome.value.success) {
      respond(res, 503, false, `Query failed: ${outcome.value.message}`);
      return;
    }

    const jobs = outcome.value.jobs.map(toJobRecordData);
    respond<QueueStatusData>(res, 200, true, `Retrieved ${jobs.length} jobs from ${queue} queue`, {
      queue,
      jobs,
      count: jobs.length,
    });
  });

  // Look a job up across the send, done and archive queues
  router.get('/job/:jobId', async (req: Request<{ jobId: string }>, res: Response) => {
    const jobId = req.params.jobId;
    const outcome = await withFaxSession(deps.backend, sessionOptions(res), (session) =>
      findJob(session, jobId, { maxCount: deps.queryMaxJobs }),
    );
    if (!outcome.ok) {
      respondUnavailable(res, outcome);
      return;
    }

    const lookup = outcome.value;
    if (!lookup.success) {
      respond(res, 503, false, `Query failed: ${lookup.message}`);
      return;
    }
    if (!lookup.found) {
      respond(res, 404, false, 'Job not found');
      return;
    }
    respond<JobInfoData>(res, 200, true, 'Job found', {
      ...toJobRecordData(lookup.found.job),
      queue: lookup.found.queue,
    });
  });

  for (const action of JOB_CONTROL_ACTIONS) {
    router.post(`/job/:jobId/${action}`, async (req: Request<{ jobId: string }>, res: Response) => {
      const jobId = req.params.jobId;
      const outcome = await withFaxSession(deps.backend, sessionOptions(res), (session) =>
        controlJob(session, action, jobId),
      );
      if (!outcome.ok) {
        respondUnavailable(res, outcome);
        return;
      }
      if (!outcome.value.success) {
        respond(res, 400, false, outcome.value.message);
        return;
      }
      console.log(`[Fax] ${action} on job ${jobId} succeeded`);
      respond<JobControlData>(res, 200, true, CONTROL_MESSAGES[action], { job_id: jobId });
    });
  }

  return router;
}
