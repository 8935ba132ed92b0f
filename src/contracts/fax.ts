import type { JobRecord, QueueType } from '../fax/types';

export interface ApiEnvelope<T extends object = Record<string, unknown>> {
  success: boolean;
  message: string;
  data: T | Record<string, never>;
}

export interface HealthData {
  status: 'healthy' | 'unhealthy';
}

export interface SendFaxData {
  job_id: string;
  group_id: string;
  total_pages: number;
}

/** Wire shape of a job record; snake_case like the rest of the envelope data. */
export interface JobRecordData {
  job_id: string;
  state: string;
  pages: string;
  dials: string;
  tts: string;
  sender: string;
  number: string;
  modem: string;
  tag: string;
  status: string;
  file_name: string;
  received: string;
}

export interface QueueStatusData {
  queue: QueueType;
  jobs: JobRecordData[];
  count: number;
}

export interface JobInfoData extends JobRecordData {
  queue: QueueType;
}

export interface JobControlData {
  job_id: string;
}

export function toJobRecordData(job: JobRecord): JobRecordData {
  return {
    job_id: job.jobId,
    state: job.state,
    pages: job.pages,
    dials: job.dials,
    tts: job.timeToSend,
    sender: job.sender,
    number: job.number,
    modem: job.modem,
    tag: job.tag,
    status: job.status,
    file_name: job.fileName,
    received: job.received,
  };
}
