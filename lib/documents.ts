export const DOC_TYPES = ['transcript', 'presentation', 'press_release'] as const;

export type DocType = (typeof DOC_TYPES)[number];

export type DocumentRecord = Readonly<{
  company: string;
  quarter: string;
  year: string;
  docType: DocType;
  url: string;
  source: string;
  date: Date | null;
}>;

export type DocumentFields = Omit<DocumentRecord, 'date'> & { date?: Date | null };

export type DocTypeFlags = {
  includeTranscripts: boolean;
  includePresentations: boolean;
  includePressReleases: boolean;
};

export const UNKNOWN_QUARTER = 'Unknown';

export function createDocumentRecord(fields: DocumentFields): DocumentRecord {
  return Object.freeze({
    company: fields.company,
    quarter: fields.quarter,
    year: fields.year,
    docType: fields.docType,
    url: fields.url,
    source: fields.source,
    date: fields.date ?? null,
  });
}

export function isDocType(value: string): value is DocType {
  return (DOC_TYPES as readonly string[]).includes(value);
}

/** Parses a comma-separated doc-type list; unknown entries are dropped, an empty list means all. */
export function parseDocTypes(raw: string | null | undefined): DocType[] {
  const picked = (raw ?? '')
    .split(',')
    .map((value) => value.trim().toLowerCase())
    .filter(isDocType);
  return picked.length > 0 ? [...new Set(picked)] : [...DOC_TYPES];
}

export function docTypeFlags(types: readonly DocType[]): DocTypeFlags {
  return {
    includeTranscripts: types.includes('transcript'),
    includePresentations: types.includes('presentation'),
    includePressReleases: types.includes('press_release'),
  };
}

export function isDocTypeIncluded(docType: DocType, flags: DocTypeFlags) {
  if (docType === 'transcript') return flags.includeTranscripts;
  if (docType === 'presentation') return flags.includePresentations;
  return flags.includePressReleases;
}

export function documentExtension(record: Pick<DocumentRecord, 'url'>) {
  const lower = record.url.toLowerCase();
  if (lower.includes('.pdf')) return '.pdf';
  if (lower.includes('.ppt')) return '.pptx';
  if (lower.includes('.mp3') || lower.includes('.wav')) return '.mp3';
  return '.pdf';
}

export function documentFilename(record: DocumentRecord) {
  const safeCompany = record.company
    .replace(/[^\w\s-]/g, '')
    .trim()
    .replace(/ /g, '_')
    .slice(0, 50);
  return `${safeCompany}_${record.quarter}${record.year}_${record.docType}${documentExtension(record)}`;
}
