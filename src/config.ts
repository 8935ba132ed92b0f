import path from 'node:path';
import os from 'node:os';

import { DEFAULT_MAX_JOBS } from './fax/queues';
import { DEFAULT_HYLAFAX_PORT } from './hylafax/connection';

export const BACKEND_KINDS = ['hylafax', 'simulated'] as const;

export type BackendKind = (typeof BACKEND_KINDS)[number];

export interface GatewayConfig {
  port: number;
  bindHost: string;
  backend: BackendKind;
  hylafax: {
    host: string;
    port: number;
    username?: string;
    password?: string;
    connectTimeoutMs: number;
    useGmt: boolean;
  };
  uploadFolder: string;
  maxContentLength: number;
  queryMaxJobs: number;
  sendRateLimit: number;
  sendWindowMs: number;
}

const DEFAULT_PORT = 5000;
const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;
const DEFAULT_MAX_CONTENT_LENGTH = 16 * 1024 * 1024;
const DEFAULT_SEND_RATE_LIMIT = 30;
const DEFAULT_SEND_WINDOW_MS = 60_000;

export function parsePort(portRaw: string | undefined, fallbackPort: number): number {
  if (!portRaw) return fallbackPort;
  const parsed = Number.parseInt(portRaw, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > 65535) {
    return fallbackPort;
  }
  return parsed;
}

export function parsePositiveInt(raw: string | undefined, fallback: number): number {
  if (!raw || !/^\s*\d+\s*$/.test(raw)) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return parsed > 0 ? parsed : fallback;
}

function parseFlag(raw: string | undefined): boolean {
  return ['1', 'true', 'yes', 'on'].includes((raw ?? '').trim().toLowerCase());
}

function readString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parseBackend(raw: string | undefined): BackendKind {
  const lowered = (raw ?? '').trim().toLowerCase();
  const kind = BACKEND_KINDS.find((candidate) => candidate === lowered);
  if (kind) return kind;
  if (lowered) console.warn(`Unknown FAX_BACKEND "${raw}"; using hylafax`);
  return 'hylafax';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  return {
    port: parsePort(env.PORT, DEFAULT_PORT),
    bindHost: readString(env.BIND_HOST) ?? readString(env.HOST) ?? '0.0.0.0',
    backend: parseBackend(env.FAX_BACKEND),
    hylafax: {
      host: readString(env.HYLAFAX_HOST) ?? 'localhost',
      port: parsePort(env.HYLAFAX_PORT, DEFAULT_HYLAFAX_PORT),
      username: readString(env.HYLAFAX_USER),
      password: env.HYLAFAX_PASSWORD || undefined,
      connectTimeoutMs: parsePositiveInt(env.HYLAFAX_CONNECT_TIMEOUT_MS, DEFAULT_CONNECT_TIMEOUT_MS),
      useGmt: parseFlag(env.HYLAFAX_USE_GMT),
    },
    uploadFolder: path.resolve(readString(env.UPLOAD_FOLDER) ?? path.join(os.tmpdir(), 'fax_uploads')),
    maxContentLength: parsePositiveInt(env.MAX_CONTENT_LENGTH, DEFAULT_MAX_CONTENT_LENGTH),
    queryMaxJobs: parsePositiveInt(env.QUERY_MAX_JOBS, DEFAULT_MAX_JOBS),
    sendRateLimit: parsePositiveInt(env.SEND_RATE_LIMIT, DEFAULT_SEND_RATE_LIMIT),
    sendWindowMs: parsePositiveInt(env.SEND_WINDOW_MS, DEFAULT_SEND_WINDOW_MS),
  };
}
