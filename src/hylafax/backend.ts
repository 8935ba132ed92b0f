/**
 * HylaFAX backend - speaks the hfaxd client protocol over TCP
 */

import { readFile } from 'node:fs/promises';
import os from 'node:os';

import { errorMessage } from '../fax/errors';
import type {
  BackendQuery,
  BackendReply,
  BackendSubmission,
  FaxBackend,
  FaxBackendHandle,
  QueueType,
  SubmissionOptions,
} from '../fax/types';
import { HylafaxConnection } from './connection';
import { renderCoverPage } from './cover';
import { listingFor, parseStatusListing } from './formats';
import { countPages } from './pages';

export interface HylafaxBackendConfig {
  port: number;
  connectTimeoutMs: number;
  username?: string;
  password?: string;
  useGmt?: boolean;
}

export interface Destination {
  recipient: string;
  number: string;
  subAddress: string;
}

/** Splits `recipient@number#subaddress`; both the recipient and sub-address are optional. */
export function parseDestination(destination: string): Destination {
  const at = destination.indexOf('@');
  const hash = destination.indexOf('#', at === -1 ? 0 : at);
  const numberStart = at === -1 ? 0 : at + 1;
  return {
    recipient: at === -1 ? '' : destination.slice(0, at),
    number: destination.slice(numberStart, hash === -1 ? undefined : hash),
    subAddress: hash === -1 ? '' : destination.slice(hash + 1),
  };
}

const PRIORITIES: Record<string, string> = {
  high: '63',
  normal: '127',
  low: '189',
  bulk: '190',
};

const PAGE_SIZES: Record<string, { width: number; length: number }> = {
  a4: { width: 209, length: 296 },
  a3: { width: 296, length: 419 },
  b4: { width: 255, length: 360 },
  letter: { width: 215, length: 279 },
  'na-let': { width: 215, length: 279 },
  legal: { width: 215, length: 355 },
  'us-leg': { width: 215, length: 355 },
};

function flag(value: boolean): string {
  return value ? 'YES' : 'NO';
}

function lookup<T>(table: Record<string, T>, key: string): T | undefined {
  const lowered = key.toLowerCase();
  return Object.hasOwn(table, lowered) ? table[lowered] : undefined;
}

/** Command lines cannot carry line breaks; anything after one would be a second command. */
function sanitize(value: string): string {
  return value.replace(/[\r\n]+/g, ' ').trim();
}

/** An empty quoted string clears a value a new job would otherwise inherit. */
function orEmpty(value: string): string {
  return value || '""';
}

/** JPARM settings shared by every job of one submission. */
export function jobParameters(options: SubmissionOptions): Array<[string, string]> {
  const params: Array<[string, string]> = [];
  const text = (name: string, value: string) => {
    const cleaned = sanitize(value);
    if (cleaned) params.push([name, cleaned]);
  };

  text('SENDTIME', options.sendTime);
  text('LASTTIME', options.killTime);
  text('RETRYTIME', options.retryTime);
  text('NOTIFY', options.notification);
  text('JOBINFO', options.jobTag);
  text('TSI', options.tsi);
  text('TAGLINE', options.tagLineFormat);
  if (options.autoCoverPage) {
    text('COMMENTS', options.coverComments);
    text('REGARDING', options.coverRegarding);
    text('FROMVOICE', options.coverFromVoice);
    text('FROMFAX', options.coverFromFax);
    text('FROMCOMPANY', options.coverFromCompany);
    text('FROMLOCATION', options.coverFromLocation);
  }
  if (options.priority) text('SCHEDPRI', lookup(PRIORITIES, options.priority) ?? options.priority);

  const pageSize = options.pageSize ? lookup(PAGE_SIZES, options.pageSize) : undefined;
  if (pageSize) {
    params.push(['PAGEWIDTH', String(pageSize.width)], ['PAGELENGTH', String(pageSize.length)]);
  } else if (options.pageSize) {
    console.warn(`[HylaFAX] Ignoring unknown page size "${options.pageSize}"`);
  }

  params.push(
    ['VRES', String(Math.round(options.vResolution))],
    ['MAXTRIES', String(options.maxRetries)],
    ['MAXDIALS', String(options.maxDials)],
    ['USEECM', flag(options.useECM)],
    ['USEXVRES', flag(options.useXVRes)],
    ['DESIREDSPEED', String(options.desiredSpeed)],
    ['MINSP', String(options.minSpeed)],
    ['DESIREDDF', String(options.desiredDataFormat)],
  );
  if (options.archive) params.push(['DONEOP', 'archive']);
  return params;
}

/**
 * JPARM settings that differ between the jobs of a multi-destination
 * submission. All three are always sent, since JNEW copies the previous job.
 */
export function destinationParameters(destination: Destination, options: SubmissionOptions): Array<[string, string]> {
  return [
    ['DIALSTRING', orEmpty(sanitize(destination.number) || sanitize(options.dialString))],
    ['TOUSER', orEmpty(sanitize(destination.recipient) || sanitize(options.recipient))],
    ['SUBADDR', orEmpty(sanitize(destination.subAddress) || sanitize(options.subAddress))],
  ];
}

function parseJobCreated(text: string): { jobId: string; groupId: string } {
  const jobId = /jobid:\s*(\w+)/i.exec(text);
  if (!jobId) throw new Error(`Server did not report a job id: ${text}`);
  const groupId = /groupid:\s*(\w+)/i.exec(text);
  return { jobId: jobId[1], groupId: groupId ? groupId[1] : '' };
}

function defaultIdentity(): string {
  return os.userInfo().username;
}

async function pageCount(file: string, content: Buffer): Promise<number> {
  try {
    return await countPages(file, content);
  } catch (error) {
    console.warn(`[HylaFAX] Could not count pages of ${file}: ${errorMessage(error)}`);
    return 0;
  }
}

class HylafaxHandle implements FaxBackendHandle {
  private connection: HylafaxConnection;
  private identity = '';

  constructor(
    private readonly host: string,
    private readonly config: HylafaxBackendConfig,
  ) {
    this.connection = this.dial();
  }

  private dial(): HylafaxConnection {
    return new HylafaxConnection(this.host, this.config.port, this.config.connectTimeoutMs);
  }

  async connect(): Promise<BackendReply> {
    // Each attempt gets its own connection so a refused one cannot poison the retry.
    this.connection.destroy();
    this.connection = this.dial();
    try {
      await this.connection.open();
      console.log(`[HylaFAX] Connected to ${this.host}:${this.config.port}`);
      return { ok: true };
    } catch (error) {
      return { ok: false, message: errorMessage(error) };
    }
  }

  async disconnect(): Promise<boolean> {
    try {
      await this.connection.quit();
      return true;
    } catch (error) {
      console.warn(`[HylaFAX] QUIT to ${this.host} failed: ${errorMessage(error)}`);
      return false;
    }
  }

  async login(username?: string): Promise<BackendReply> {
    try {
      const user = sanitize(username || this.config.username || defaultIdentity());
      const reply = await this.connection.command(`USER ${user}`);
      if (reply.code === 331) {
        if (!this.config.password) return { ok: false, message: reply.text };
        await this.connection.run(`PASS ${sanitize(this.config.password)}`);
      } else if (reply.code !== 230) {
        return { ok: false, message: reply.text };
      }
      await this.connection.run(`TZONE ${this.config.useGmt ? 'GMT' : 'LOCAL'}`);
      this.identity = user;
      return { ok: true };
    } catch (error) {
      return { ok: false, message: errorMessage(error) };
    }
  }

  async submitJob(files: string[], destinations: string[], options: SubmissionOptions): Promise<BackendSubmission> {
    try {
      await this.connection.run('TYPE I');
      const documents: string[] = [];
      let totalPages = 0;
      for (const file of files) {
        const content = await readFile(file);
        totalPages += await pageCount(file, content);
        documents.push(await this.connection.store(content));
      }

      const template =
        options.autoCoverPage && options.coverTemplate ? await readFile(options.coverTemplate, 'latin1') : null;
      const shared = jobParameters(options);

      // Every job carries its full parameter and document set; only the group is inherited.
      let first: { jobId: string; groupId: string } | null = null;
      for (const destination of destinations) {
        const target = parseDestination(destination);
        const cover =
          template === null ? null : await this.storeCoverPage(template, target, options, totalPages);
        const created = parseJobCreated((await this.connection.run('JNEW')).text);

        const params = [...shared, ...destinationParameters(target, options)];
        if (cover) params.push(['COVER', cover]);
        for (const document of documents) params.push(['DOCUMENT', document]);
        for (const [name, value] of params) {
          await this.connection.run(`JPARM ${name} ${value}`);
        }
        await this.connection.run('JSUBM');
        console.log(`[HylaFAX] Submitted job ${created.jobId} (group ${created.groupId || '-'}) to ${destination}`);
        if (!first) first = created;
      }
      if (!first) return { ok: false, message: 'No destinations specified' };
      return { ok: true, jobId: first.jobId, groupId: first.groupId, totalPages };
    } catch (error) {
      return { ok: false, message: errorMessage(error) };
    }
  }

  private storeCoverPage(
    template: string,
    target: Destination,
    options: SubmissionOptions,
    totalPages: number,
  ): Promise<string> {
    const page = renderCoverPage(template, {
      to: target.recipient || options.recipient,
      toFaxNumber: target.number || options.dialString,
      from: this.identity,
      fromCompany: options.coverFromCompany,
      fromLocation: options.coverFromLocation,
      fromVoiceNumber: options.coverFromVoice,
      fromFaxNumber: options.coverFromFax,
      regarding: options.coverRegarding,
      comments: options.coverComments,
      pageCount: totalPages,
      date: new Date().toDateString(),
    });
    return this.connection.store(Buffer.from(page, 'latin1'));
  }

  async queryJobs(queue: QueueType, maxCount: number): Promise<BackendQuery> {
    const layout = listingFor(queue);
    try {
      await this.connection.run(`${layout.formatCommand} "${layout.format}"`);
      const listing = await this.connection.list(layout.directory);
      return { ok: true, jobs: parseStatusListing(listing, layout).slice(0, maxCount) };
    } catch (error) {
      return { ok: false, message: errorMessage(error) };
    }
  }

  killJob(jobId: string): Promise<BackendReply> {
    return this.jobCommand('JKILL', jobId);
  }

  suspendJob(jobId: string): Promise<BackendReply> {
    return this.jobCommand('JSUSP', jobId);
  }

  resumeJob(jobId: string): Promise<BackendReply> {
    return this.jobCommand('JSUBM', jobId);
  }

  waitJob(jobId: string): Promise<BackendReply> {
    return this.jobCommand('JWAIT', jobId);
  }

  destroy(): void {
    this.connection.destroy();
  }

  private async jobCommand(command: string, jobId: string): Promise<BackendReply> {
    if (/\s/.test(jobId)) return { ok: false, message: `Invalid job id "${sanitize(jobId)}"` };
    try {
      await this.connection.run(`${command} ${jobId}`);
      return { ok: true };
    } catch (error) {
      return { ok: false, message: errorMessage(error) };
    }
  }
}

export class HylafaxBackend implements FaxBackend {
  readonly name = 'hylafax';

  constructor(private readonly config: HylafaxBackendConfig) {}

  create(host: string): FaxBackendHandle {
    return new HylafaxHandle(host, this.config);
  }
}
