import type { SubmissionOptions } from './types';

type FieldKind = 'string' | 'float' | 'integer' | 'boolean';

type FieldsOfKind<K extends FieldKind> = {
  [F in keyof SubmissionOptions]: SubmissionOptions[F] extends (K extends 'string'
    ? string
    : K extends 'boolean'
      ? boolean
      : number)
    ? F
    : never;
}[keyof SubmissionOptions];

const STRING_FIELDS = [
  'recipient',
  'dialString',
  'subAddress',
  'coverComments',
  'coverRegarding',
  'coverFromVoice',
  'coverFromFax',
  'coverFromCompany',
  'coverFromLocation',
  'coverTemplate',
  'tagLineFormat',
  'jobTag',
  'tsi',
  'sendTime',
  'killTime',
  'retryTime',
  'pageSize',
  'notification',
  'priority',
] as const satisfies readonly FieldsOfKind<'string'>[];

const FLOAT_FIELDS = ['vResolution'] as const satisfies readonly FieldsOfKind<'float'>[];

const INTEGER_FIELDS = [
  'maxRetries',
  'maxDials',
  'desiredSpeed',
  'minSpeed',
  'desiredDataFormat',
] as const satisfies readonly FieldsOfKind<'integer'>[];

const BOOLEAN_FIELDS = ['autoCoverPage', 'useECM', 'useXVRes', 'archive'] as const satisfies readonly FieldsOfKind<'boolean'>[];

const FIELD_KINDS = new Map<string, FieldKind>([
  ...STRING_FIELDS.map((field) => [field, 'string'] as const),
  ...FLOAT_FIELDS.map((field) => [field, 'float'] as const),
  ...INTEGER_FIELDS.map((field) => [field, 'integer'] as const),
  ...BOOLEAN_FIELDS.map((field) => [field, 'boolean'] as const),
]);

export const DEFAULT_SUBMISSION_OPTIONS: Readonly<SubmissionOptions> = Object.freeze({
  recipient: '',
  dialString: '',
  subAddress: '',
  coverComments: '',
  coverRegarding: '',
  coverFromVoice: '',
  coverFromFax: '',
  coverFromCompany: '',
  coverFromLocation: '',
  coverTemplate: '',
  tagLineFormat: '',
  jobTag: '',
  tsi: '',
  sendTime: '',
  killTime: '',
  retryTime: '',
  pageSize: '',
  notification: 'done',
  priority: 'normal',
  vResolution: 98,
  maxRetries: 3,
  maxDials: 12,
  autoCoverPage: true,
  useECM: true,
  useXVRes: false,
  archive: false,
  desiredSpeed: 14400,
  minSpeed: 2400,
  desiredDataFormat: 0,
});

const TRUE_WORDS = new Set(['true', 'yes', 'on', '1']);
const FALSE_WORDS = new Set(['false', 'no', 'off', '0']);

function toText(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value === 'boolean') return String(value);
  return null;
}

function toFloat(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string' || !value.trim()) return null;
  const parsed = Number(value.trim());
  return Number.isFinite(parsed) ? parsed : null;
}

function toInteger(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? Math.trunc(value) : null;
  if (typeof value !== 'string' || !/^\s*[+-]?\d+\s*$/.test(value)) return null;
  return Number.parseInt(value, 10);
}

function toBoolean(value: unknown): boolean | null {
  if (typeof value === 'boolean') return value;
  if (value === 1 || value === 0) return value === 1;
  if (typeof value !== 'string') return null;
  const lowered = value.trim().toLowerCase();
  if (TRUE_WORDS.has(lowered)) return true;
  if (FALSE_WORDS.has(lowered)) return false;
  return null;
}

function isStringField(key: string): key is FieldsOfKind<'string'> {
  return FIELD_KINDS.get(key) === 'string';
}

function isNumberField(key: string): key is FieldsOfKind<'float'> | FieldsOfKind<'integer'> {
  const kind = FIELD_KINDS.get(key);
  return kind === 'float' || kind === 'integer';
}

function isBooleanField(key: string): key is FieldsOfKind<'boolean'> {
  return FIELD_KINDS.get(key) === 'boolean';
}

/**
 * Builds a complete options record from a sparse caller mapping. Recognised
 * keys are coerced to their field type; unknown keys and values that cannot
 * be coerced leave the defaults untouched. Never throws.
 */
export function marshalSubmissionOptions(raw: Record<string, unknown> | null | undefined): SubmissionOptions {
  const options: SubmissionOptions = { ...DEFAULT_SUBMISSION_OPTIONS };
  if (!raw) return options;

  for (const [key, value] of Object.entries(raw)) {
    if (isStringField(key)) {
      const text = toText(value);
      if (text !== null) options[key] = text;
    } else if (isNumberField(key)) {
      const number = FIELD_KINDS.get(key) === 'float' ? toFloat(value) : toInteger(value);
      if (number !== null) options[key] = number;
    } else if (isBooleanField(key)) {
      const flag = toBoolean(value);
      if (flag !== null) options[key] = flag;
    }
  }
  return options;
}

export function unrecognizedOptionKeys(raw: Record<string, unknown> | null | undefined): string[] {
  if (!raw) return [];
  return Object.keys(raw).filter((key) => !FIELD_KINDS.has(key));
}
