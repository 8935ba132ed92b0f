import type { JobRecord, QueueType } from '../fax/types';

export type FormatCommand = 'JOBFMT' | 'RCVFMT' | 'FILEFMT' | 'MDMFMT';

export interface ListingLayout {
  directory: string;
  formatCommand: FormatCommand;
  format: string;
  /** Record fields in the order the format emits them; the last one takes the rest of the line. */
  fields: readonly (keyof JobRecord)[];
  /** Lines without a value for this field are not records. */
  identity: keyof JobRecord;
}

export const FIELD_SEPARATOR = '|';

const JOB_FIELDS = ['jobId', 'state', 'pages', 'dials', 'timeToSend', 'sender', 'number', 'modem', 'tag', 'status'] as const;
const JOB_FORMAT = ['%j', '%a', '%P', '%D', '%Y', '%o', '%e', '%m', '%J', '%s'].join(FIELD_SEPARATOR);

function jobListing(directory: string): ListingLayout {
  return { directory, formatCommand: 'JOBFMT', format: JOB_FORMAT, fields: JOB_FIELDS, identity: 'jobId' };
}

export function listingFor(queue: QueueType): ListingLayout {
  switch (queue) {
    case 'send':
      return jobListing('sendq');
    case 'done':
      return jobListing('doneq');
    case 'archive':
      return jobListing('archive');
    case 'received':
      return {
        directory: 'recvq',
        formatCommand: 'RCVFMT',
        format: ['%f', '%p', '%s', '%t', '%e'].join(FIELD_SEPARATOR),
        fields: ['fileName', 'pages', 'sender', 'received', 'status'],
        identity: 'fileName',
      };
    case 'document':
      return {
        directory: 'docq',
        formatCommand: 'FILEFMT',
        format: ['%f', '%o', '%m'].join(FIELD_SEPARATOR),
        fields: ['fileName', 'sender', 'received'],
        identity: 'fileName',
      };
    case 'server-status':
      return {
        directory: 'status',
        formatCommand: 'MDMFMT',
        format: ['%m', '%n', '%s'].join(FIELD_SEPARATOR),
        fields: ['modem', 'number', 'status'],
        identity: 'modem',
      };
    default: {
      const unreachable: never = queue;
      throw new Error(`Unknown queue type: ${String(unreachable)}`);
    }
  }
}

export function parseStatusLine(line: string, layout: ListingLayout): Partial<JobRecord> | null {
  const parts = line.split(FIELD_SEPARATOR);
  const record: Partial<JobRecord> = {};
  layout.fields.forEach((field, index) => {
    const last = index === layout.fields.length - 1;
    const value = last ? parts.slice(index).join(FIELD_SEPARATOR) : parts[index];
    const trimmed = (value ?? '').trim();
    if (trimmed) record[field] = trimmed;
  });
  return record[layout.identity] ? record : null;
}

/** Decodes a LIST response produced under `layout.format`, one record per line. */
export function parseStatusListing(listing: string, layout: ListingLayout): Partial<JobRecord>[] {
  const records: Partial<JobRecord>[] = [];
  for (const line of listing.split(/\r?\n/)) {
    if (!line.trim()) continue;
    const record = parseStatusLine(line, layout);
    if (record) records.push(record);
  }
  return records;
}
