/**
 * Fax backend binding - implement for any server that can queue fax jobs
 */

export const QUEUE_TYPES = ['send', 'done', 'received', 'archive', 'document', 'server-status'] as const;

export type QueueType = (typeof QUEUE_TYPES)[number];

export interface SubmissionOptions {
  recipient: string;
  dialString: string;
  subAddress: string;
  coverComments: string;
  coverRegarding: string;
  coverFromVoice: string;
  coverFromFax: string;
  coverFromCompany: string;
  coverFromLocation: string;
  coverTemplate: string;
  tagLineFormat: string;
  jobTag: string;
  tsi: string;
  sendTime: string;
  killTime: string;
  retryTime: string;
  pageSize: string;
  notification: string;
  priority: string;
  vResolution: number;
  maxRetries: number;
  maxDials: number;
  autoCoverPage: boolean;
  useECM: boolean;
  useXVRes: boolean;
  archive: boolean;
  desiredSpeed: number;
  minSpeed: number;
  desiredDataFormat: number;
}

export interface SubmissionResult {
  success: boolean;
  jobId: string;
  groupId: string;
  totalPages: number;
  errorMessage: string;
}

/** Every field is always present; values the backend leaves unset are empty strings. */
export interface JobRecord {
  jobId: string;
  state: string;
  pages: string;
  dials: string;
  timeToSend: string;
  sender: string;
  number: string;
  modem: string;
  tag: string;
  status: string;
  fileName: string;
  received: string;
}

export interface JobControlOutcome {
  success: boolean;
  message: string;
}

export type BackendReply = { ok: true } | { ok: false; message: string };

export type BackendSubmission =
  | { ok: true; jobId: string; groupId: string; totalPages: number }
  | { ok: false; message: string };

export type BackendQuery = { ok: true; jobs: Partial<JobRecord>[] } | { ok: false; message: string };

export interface FaxBackendHandle {
  connect(): Promise<BackendReply>;
  disconnect(): Promise<boolean>;
  /** An undefined username asks the backend to resolve its default identity. */
  login(username?: string): Promise<BackendReply>;
  submitJob(files: string[], destinations: string[], options: SubmissionOptions): Promise<BackendSubmission>;
  queryJobs(queue: QueueType, maxCount: number): Promise<BackendQuery>;
  killJob(jobId: string): Promise<BackendReply>;
  suspendJob(jobId: string): Promise<BackendReply>;
  resumeJob(jobId: string): Promise<BackendReply>;
  waitJob(jobId: string): Promise<BackendReply>;
  /** Drops the connection without a protocol goodbye; pending calls settle as failures. */
  destroy(): void;
}

export interface FaxBackend {
  readonly name: string;
  create(host: string): FaxBackendHandle;
}
