import type { FaxSession } from './session';
import type { BackendReply, FaxBackendHandle, JobControlOutcome } from './types';

export const JOB_CONTROL_ACTIONS = ['kill', 'suspend', 'resume', 'wait'] as const;

export type JobControlAction = (typeof JOB_CONTROL_ACTIONS)[number];

function dispatch(handle: FaxBackendHandle, action: JobControlAction, jobId: string): Promise<BackendReply> {
  switch (action) {
    case 'kill':
      return handle.killJob(jobId);
    case 'suspend':
      return handle.suspendJob(jobId);
    case 'resume':
      return handle.resumeJob(jobId);
    case 'wait':
      return handle.waitJob(jobId);
    default: {
      const unreachable: never = action;
      throw new Error(`Unknown job control action: ${String(unreachable)}`);
    }
  }
}

/**
 * Runs one control action against a job. `wait` holds the session until the
 * backend reports the job finished; abandoning the session is the only way
 * to cut it short.
 */
export async function controlJob(
  session: FaxSession,
  action: JobControlAction,
  jobId: string,
): Promise<JobControlOutcome> {
  const handle = session.authenticatedHandle(`${action} job ${jobId}`);
  if (!jobId.trim()) return { success: false, message: 'Job id is required' };

  const reply = await dispatch(handle, action, jobId);
  return reply.ok ? { success: true, message: '' } : { success: false, message: reply.message };
}

export const killJob = (session: FaxSession, jobId: string) => controlJob(session, 'kill', jobId);
export const suspendJob = (session: FaxSession, jobId: string) => controlJob(session, 'suspend', jobId);
export const resumeJob = (session: FaxSession, jobId: string) => controlJob(session, 'resume', jobId);
export const waitForJob = (session: FaxSession, jobId: string) => controlJob(session, 'wait', jobId);
