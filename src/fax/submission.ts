import type { FaxSession } from './session';
import type { SubmissionOptions, SubmissionResult } from './types';

function failure(errorMessage: string, jobId = ''): SubmissionResult {
  return { success: false, jobId, groupId: '', totalPages: 0, errorMessage };
}

/**
 * Submits every file to every destination as one logical job. Fan-out across
 * destinations is left entirely to the backend; this only reports the ids it
 * hands back.
 */
export async function submitFax(
  session: FaxSession,
  files: readonly string[],
  destinations: readonly string[],
  options: SubmissionOptions,
): Promise<SubmissionResult> {
  if (files.length === 0) return failure('No files provided');
  if (destinations.length === 0) return failure('No destinations specified');

  const handle = session.authenticatedHandle('submit a fax');
  const reply = await handle.submitJob([...files], [...destinations], options);
  if (!reply.ok) return failure(reply.message);

  // HylaFAX numbers a group after its first job, so that id stands in when the backend omits one.
  const groupId = destinations.length > 1 ? reply.groupId || reply.jobId : '';
  return {
    success: true,
    jobId: reply.jobId,
    groupId,
    totalPages: Number.isFinite(reply.totalPages) ? Math.max(0, Math.trunc(reply.totalPages)) : 0,
    errorMessage: '',
  };
}
