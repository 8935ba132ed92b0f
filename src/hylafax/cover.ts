export interface CoverPageFields {
  to: string;
  toFaxNumber: string;
  from: string;
  fromCompany: string;
  fromLocation: string;
  fromVoiceNumber: string;
  fromFaxNumber: string;
  regarding: string;
  comments: string;
  pageCount: number;
  date: string;
}

function psString(value: string): string {
  const escaped = value.replace(/[\r\n]+/g, ' ').replace(/[\\()]/g, (char) => `\\${char}`);
  return `(${escaped})`;
}

/**
 * Fills a PostScript cover template the way faxcover does: the variables the
 * template draws with are defined right after its header line.
 */
export function renderCoverPage(template: string, fields: CoverPageFields): string {
  const definitions: Array<[string, string]> = [
    ['to', fields.to],
    ['to-fax-number', fields.toFaxNumber],
    ['from', fields.from],
    ['from-company', fields.fromCompany],
    ['from-location', fields.fromLocation],
    ['from-voice-number', fields.fromVoiceNumber],
    ['from-fax-number', fields.fromFaxNumber],
    ['regarding', fields.regarding],
    ['comments', fields.comments],
    ['page-count', String(fields.pageCount)],
    ['todays-date', fields.date],
  ];

  const lines = template.split(/\r?\n/);
  const header = lines[0]?.startsWith('%!') ? lines.shift() : undefined;
  return [
    header ?? '%!PS-Adobe-2.0',
    ...definitions.map(([name, value]) => `/${name} ${psString(value)} def`),
    ...lines,
  ].join('\n');
}
