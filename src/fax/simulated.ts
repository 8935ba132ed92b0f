/**
 * Simulated fax backend - for demos and local development
 * Jobs live in memory and move to the done queue when waited on
 */

import path from 'node:path';

import type {
  BackendQuery,
  BackendReply,
  BackendSubmission,
  FaxBackend,
  FaxBackendHandle,
  JobRecord,
  QueueType,
  SubmissionOptions,
} from './types';

interface SimulatedJob {
  jobId: string;
  groupId: string;
  number: string;
  owner: string;
  tag: string;
  pages: number;
  maxDials: number;
  state: 'pending' | 'suspended' | 'done' | 'failed';
  archiveWhenDone: boolean;
  archived: boolean;
}

const STATE_SYMBOLS: Record<SimulatedJob['state'], string> = {
  pending: 'P',
  suspended: 'S',
  done: 'D',
  failed: 'F',
};

function toRecord(job: SimulatedJob): Partial<JobRecord> {
  return {
    jobId: job.jobId,
    state: STATE_SYMBOLS[job.state],
    pages: `${job.state === 'done' ? job.pages : 0}:${job.pages}`,
    dials: `${job.state === 'done' ? 1 : 0}:${job.maxDials}`,
    sender: job.owner,
    number: job.number,
    tag: job.tag,
    status: job.state === 'failed' ? 'Job aborted by request' : '',
  };
}

export class SimulatedBackend implements FaxBackend {
  readonly name = 'simulated';

  private readonly jobs = new Map<string, SimulatedJob>();
  private nextJobId = 1;

  /** Hosts listed here refuse connections, to exercise the unreachable path. */
  constructor(private readonly unreachableHosts: readonly string[] = []) {}

  create(host: string): FaxBackendHandle {
    let connected = false;
    let user = '';
    const backend = this;

    const guard = (): BackendReply => (connected && user ? { ok: true } : { ok: false, message: 'Not logged in' });
    const find = (jobId: string): SimulatedJob | { ok: false; message: string } =>
      backend.jobs.get(jobId) ?? { ok: false, message: `Unknown job "${jobId}"` };

    return {
      async connect(): Promise<BackendReply> {
        if (backend.unreachableHosts.includes(host)) {
          return { ok: false, message: `Can not reach service hylafax at host "${host}"` };
        }
        connected = true;
        return { ok: true };
      },

      async disconnect(): Promise<boolean> {
        connected = false;
        user = '';
        return true;
      },

      async login(username?: string): Promise<BackendReply> {
        if (!connected) return { ok: false, message: 'Not connected' };
        user = username || 'fax';
        return { ok: true };
      },

      async submitJob(files: string[], destinations: string[], options: SubmissionOptions): Promise<BackendSubmission> {
        const allowed = guard();
        if (!allowed.ok) return allowed;
        let groupId = '';
        let firstJobId = '';
        for (const destination of destinations) {
          const jobId = String(backend.nextJobId++);
          if (!groupId) groupId = jobId;
          if (!firstJobId) firstJobId = jobId;
          backend.jobs.set(jobId, {
            jobId,
            groupId,
            number: destination,
            owner: user,
            tag: options.jobTag || files.map((file) => path.basename(file)).join(','),
            pages: files.length,
            maxDials: options.maxDials,
            state: 'pending',
            archiveWhenDone: options.archive,
            archived: false,
          });
        }
        return { ok: true, jobId: firstJobId, groupId, totalPages: files.length };
      },

      async queryJobs(queue: QueueType, maxCount: number): Promise<BackendQuery> {
        const allowed = guard();
        if (!allowed.ok) return allowed;
        const all = [...backend.jobs.values()];
        let selected: Partial<JobRecord>[];
        switch (queue) {
          case 'send':
            selected = all.filter((job) => job.state === 'pending' || job.state === 'suspended').map(toRecord);
            break;
          case 'done':
            selected = all.filter((job) => (job.state === 'done' || job.state === 'failed') && !job.archived).map(toRecord);
            break;
          case 'archive':
            selected = all.filter((job) => job.archived).map(toRecord);
            break;
          case 'received':
          case 'document':
            selected = [];
            break;
          case 'server-status':
            selected = [{ modem: 'ttyS0', number: '+15550000000', status: 'Running and idle' }];
            break;
          default: {
            const unreachable: never = queue;
            return { ok: false, message: `Unknown queue ${String(unreachable)}` };
          }
        }
        return { ok: true, jobs: selected.slice(0, maxCount) };
      },

      async killJob(jobId: string): Promise<BackendReply> {
        const allowed = guard();
        if (!allowed.ok) return allowed;
        const job = find(jobId);
        if (!('jobId' in job)) return job;
        if (job.state === 'done' || job.state === 'failed') return { ok: false, message: `Job ${jobId} is already finished` };
        job.state = 'failed';
        return { ok: true };
      },

      async suspendJob(jobId: string): Promise<BackendReply> {
        const allowed = guard();
        if (!allowed.ok) return allowed;
        const job = find(jobId);
        if (!('jobId' in job)) return job;
        if (job.state !== 'pending') return { ok: false, message: `Job ${jobId} is not pending` };
        job.state = 'suspended';
        return { ok: true };
      },

      async resumeJob(jobId: string): Promise<BackendReply> {
        const allowed = guard();
        if (!allowed.ok) return allowed;
        const job = find(jobId);
        if (!('jobId' in job)) return job;
        if (job.state !== 'suspended') return { ok: false, message: `Job ${jobId} is not suspended` };
        job.state = 'pending';
        return { ok: true };
      },

      async waitJob(jobId: string): Promise<BackendReply> {
        const allowed = guard();
        if (!allowed.ok) return allowed;
        const job = find(jobId);
        if (!('jobId' in job)) return job;
        if (job.state === 'pending') {
          job.state = 'done';
          job.archived = job.archiveWhenDone;
        }
        if (job.state === 'suspended') return { ok: false, message: `Job ${jobId} is suspended` };
        return job.state === 'done' ? { ok: true } : { ok: false, message: `Job ${jobId} failed` };
      },

      destroy(): void {
        connected = false;
        user = '';
      },
    };
  }
}
