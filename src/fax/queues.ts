import type { FaxSession } from './session';
import { QUEUE_TYPES, type JobRecord, type QueueType } from './types';

export const DEFAULT_MAX_JOBS = 1000;

export type QueueQueryResult = {
  success: boolean;
  jobs: JobRecord[];
  message: string;
};

export type JobLookup =
  | { success: true; found: { queue: QueueType; job: JobRecord } | null }
  | { success: false; message: string };

const QUEUE_ALIASES = new Map<string, QueueType>([
  ['recv', 'received'],
  ['server', 'server-status'],
  ['status', 'server-status'],
]);

/** Queues searched, in order, when looking a job up by id. */
export const JOB_LOOKUP_QUEUES: readonly QueueType[] = ['send', 'done', 'archive'];

export function isQueueType(value: string): value is QueueType {
  return QUEUE_TYPES.some((queue) => queue === value);
}

export function parseQueueType(raw: string | undefined): QueueType | null {
  const lowered = (raw ?? '').trim().toLowerCase();
  if (isQueueType(lowered)) return lowered;
  return QUEUE_ALIASES.get(lowered) ?? null;
}

export function normalizeJobRecord(raw: Partial<JobRecord>): JobRecord {
  return {
    jobId: raw.jobId ?? '',
    state: raw.state ?? '',
    pages: raw.pages ?? '',
    dials: raw.dials ?? '',
    timeToSend: raw.timeToSend ?? '',
    sender: raw.sender ?? '',
    number: raw.number ?? '',
    modem: raw.modem ?? '',
    tag: raw.tag ?? '',
    status: raw.status ?? '',
    fileName: raw.fileName ?? '',
    received: raw.received ?? '',
  };
}

export async function queryJobs(
  session: FaxSession,
  queue: QueueType,
  options: { maxCount?: number } = {},
): Promise<QueueQueryResult> {
  const maxCount = Math.max(0, Math.trunc(options.maxCount ?? DEFAULT_MAX_JOBS));
  const handle = session.authenticatedHandle(`query the ${queue} queue`);

  const reply = await handle.queryJobs(queue, maxCount);
  if (!reply.ok) {
    console.warn(`[Fax] Query of ${queue} queue failed: ${reply.message}`);
    return { success: false, jobs: [], message: reply.message };
  }
  return { success: true, jobs: reply.jobs.slice(0, maxCount).map(normalizeJobRecord), message: '' };
}

export async function findJob(
  session: FaxSession,
  jobId: string,
  options: { maxCount?: number } = {},
): Promise<JobLookup> {
  for (const queue of JOB_LOOKUP_QUEUES) {
    const result = await queryJobs(session, queue, options);
    if (!result.success) return { success: false, message: result.message };
    const job = result.jobs.find((candidate) => candidate.jobId === jobId);
    if (job) return { success: true, found: { queue, job } };
  }
  return { success: true, found: null };
}
