import net from 'node:net';

export interface Reply {
  code: number;
  text: string;
}

export class HylafaxReplyError extends Error {
  readonly name = 'HylafaxReplyError';

  constructor(
    readonly command: string,
    readonly reply: Reply,
  ) {
    super(reply.text || `${command} failed (${reply.code})`);
  }
}

type Waiter = {
  resolve: (reply: Reply) => void;
  reject: (error: Error) => void;
};

type Collected = { ok: true; data: Buffer } | { ok: false; error: Error };

const REPLY_LINE = /^(\d{3})([ -])(.*)$/;
const PASSIVE_ADDRESS = /(\d+),(\d+),(\d+),(\d+),(\d+),(\d+)/;

export const DEFAULT_HYLAFAX_PORT = 4559;

export function isPositive(reply: Reply): boolean {
  return reply.code >= 200 && reply.code < 300;
}

export function parsePassiveReply(text: string, fallbackHost: string): { host: string; port: number } {
  const match = PASSIVE_ADDRESS.exec(text);
  if (!match) throw new Error(`Unparseable passive mode reply: ${text}`);
  const [, a, b, c, d, high, low] = match;
  const host = `${a}.${b}.${c}.${d}`;
  return {
    host: host === '0.0.0.0' ? fallbackHost : host,
    port: Number(high) * 256 + Number(low),
  };
}

function connectSocket(host: string, port: number, timeoutMs: number): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const socket = net.connect({ host, port });
    const cleanup = () => {
      socket.off('error', onError);
      socket.off('timeout', onTimeout);
      socket.off('close', onClose);
    };
    const onError = (error: Error) => {
      cleanup();
      socket.destroy();
      reject(error);
    };
    const onTimeout = () => onError(new Error(`Timed out connecting to ${host}:${port}`));
    const onClose = () => onError(new Error(`Connection to ${host}:${port} closed`));
    socket.setTimeout(timeoutMs);
    socket.once('error', onError);
    socket.once('timeout', onTimeout);
    socket.once('close', onClose);
    socket.once('connect', () => {
      cleanup();
      socket.setTimeout(0);
      resolve(socket);
    });
  });
}

function collect(socket: net.Socket): Promise<Collected> {
  return new Promise((resolve) => {
    const chunks: Buffer[] = [];
    socket.on('data', (chunk: Buffer) => chunks.push(chunk));
    socket.once('error', (error) => resolve({ ok: false, error }));
    socket.once('close', () => resolve({ ok: true, data: Buffer.concat(chunks) }));
  });
}

/**
 * Control connection to an hfaxd server. Replies follow the FTP convention:
 * a three digit code, with `NNN-` opening a multi-line reply that ends at the
 * first line starting `NNN `.
 */
export class HylafaxConnection {
  private socket: net.Socket | null = null;
  private pending = '';
  private multiline: { code: string; lines: string[] } | null = null;
  private readonly replies: Reply[] = [];
  private readonly waiters: Waiter[] = [];
  private failure: Error | null = null;

  constructor(
    readonly host: string,
    readonly port: number,
    private readonly timeoutMs: number,
  ) {}

  /** Dials and reads the greeting. A connection is single use: retry with a new instance. */
  async open(): Promise<Reply> {
    if (this.failure) throw this.failure;
    if (this.socket) throw new Error('Connection already opened');
    const socket = await connectSocket(this.host, this.port, this.timeoutMs);
    if (this.failure) {
      socket.destroy();
      throw this.failure;
    }
    this.attach(socket);
    // The greeting is bounded by the connect timeout; later replies (JWAIT) are not.
    socket.setTimeout(this.timeoutMs);
    try {
      const greeting = await this.readReply();
      if (greeting.code !== 220) throw new HylafaxReplyError('connect', greeting);
      socket.setTimeout(0);
      return greeting;
    } catch (error) {
      this.destroy();
      throw error;
    }
  }

  /** Sends one command line and resolves with the next reply, whatever its code. */
  command(line: string): Promise<Reply> {
    const socket = this.socket;
    if (this.failure) return Promise.reject(this.failure);
    if (!socket) return Promise.reject(new Error('Not connected to server'));
    const reply = this.readReply();
    socket.write(`${line}\r\n`);
    return reply;
  }

  /** Like `command`, but anything other than a 2xx reply is thrown. */
  async run(line: string): Promise<Reply> {
    const reply = await this.command(line);
    if (!isPositive(reply)) throw new HylafaxReplyError(line.split(' ')[0], reply);
    return reply;
  }

  readReply(): Promise<Reply> {
    const queued = this.replies.shift();
    if (queued) return Promise.resolve(queued);
    if (this.failure) return Promise.reject(this.failure);
    return new Promise((resolve, reject) => this.waiters.push({ resolve, reject }));
  }

  /** Uploads a document into the server's temporary area and returns the name it was stored under. */
  async store(content: Buffer): Promise<string> {
    const data = await this.openDataConnection();
    try {
      const opening = await this.command('STOT');
      if (opening.code !== 150 && opening.code !== 125) throw new HylafaxReplyError('STOT', opening);
      const stored = /FILE:\s*(\S+)/.exec(opening.text);

      await new Promise<void>((resolve, reject) => {
        data.once('error', reject);
        data.end(content, () => resolve());
      });
      const done = await this.readReply();
      if (done.code !== 226) throw new HylafaxReplyError('STOT', done);
      if (!stored) throw new Error(`Server did not name the stored document: ${opening.text}`);
      return stored[1];
    } finally {
      data.destroy();
    }
  }

  /** Lists a server directory through a passive data connection. */
  async list(directory: string): Promise<string> {
    const data = await this.openDataConnection();
    const collected = collect(data);
    try {
      const opening = await this.command(`LIST ${directory}`);
      if (opening.code !== 150 && opening.code !== 125) throw new HylafaxReplyError('LIST', opening);
      const [listing, done] = await Promise.all([collected, this.readReply()]);
      if (done.code !== 226) throw new HylafaxReplyError('LIST', done);
      if (!listing.ok) throw listing.error;
      return listing.data.toString('utf8');
    } finally {
      data.destroy();
    }
  }

  async quit(): Promise<void> {
    const socket = this.socket;
    if (!socket || this.failure) return;
    try {
      await this.command('QUIT');
    } finally {
      socket.end();
    }
  }

  destroy(): void {
    this.fail(new Error('Connection released'));
    this.socket?.destroy();
  }

  private async openDataConnection(): Promise<net.Socket> {
    const reply = await this.command('PASV');
    if (reply.code !== 227) throw new HylafaxReplyError('PASV', reply);
    const { host, port } = parsePassiveReply(reply.text, this.host);
    const socket = await connectSocket(host, port, this.timeoutMs);
    socket.on('error', (error) => console.warn(`[HylaFAX] Data connection to ${host}:${port} failed: ${error.message}`));
    return socket;
  }

  private attach(socket: net.Socket): void {
    this.socket = socket;
    socket.setEncoding('utf8');
    socket.on('data', (chunk: Buffer | string) => this.consume(chunk.toString()));
    socket.on('error', (error) => this.fail(error));
    socket.on('timeout', () => {
      this.fail(new Error(`Timed out waiting for ${this.host}:${this.port}`));
      socket.destroy();
    });
    socket.on('close', () => this.fail(new Error('Connection closed by server')));
  }

  private consume(chunk: string): void {
    this.pending += chunk;
    let newline = this.pending.indexOf('\n');
    while (newline !== -1) {
      const line = this.pending.slice(0, newline).replace(/\r$/, '');
      this.pending = this.pending.slice(newline + 1);
      this.handleLine(line);
      newline = this.pending.indexOf('\n');
    }
  }

  private handleLine(line: string): void {
    if (this.multiline) {
      const terminator = `${this.multiline.code} `;
      if (line.startsWith(terminator)) {
        this.multiline.lines.push(line.slice(terminator.length));
        this.deliver({ code: Number(this.multiline.code), text: this.multiline.lines.join('\n') });
        this.multiline = null;
      } else {
        this.multiline.lines.push(line);
      }
      return;
    }

    const match = REPLY_LINE.exec(line);
    if (!match) {
      console.warn(`[HylaFAX] Ignoring unexpected line from ${this.host}: ${line}`);
      return;
    }
    if (match[2] === '-') {
      this.multiline = { code: match[1], lines: [match[3]] };
      return;
    }
    this.deliver({ code: Number(match[1]), text: match[3] });
  }

  private deliver(reply: Reply): void {
    const waiter = this.waiters.shift();
    if (waiter) waiter.resolve(reply);
    else this.replies.push(reply);
  }

  private fail(error: Error): void {
    if (this.failure) return;
    this.failure = error;
    for (const waiter of this.waiters.splice(0)) waiter.reject(error);
  }
}
