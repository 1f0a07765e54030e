import { v4 as uuidv4 } from 'uuid';
import { FORM_SECTIONS, PASSTHROUGH_FIELDS, isEditableField } from '../kyc/form-sections';
import { fieldLabel } from '../kyc/record-schema';
import type { KycRecord, KycTextField, WorkingRecord } from '../kyc/record-schema';
import type { BackendAttempt, ExtractionResult } from '../ocr/extraction-orchestrator';
import { InvalidEditError, NoRecordError } from '../errors';

/**
 * Everything one operator's review needs, passed explicitly between operations.
 * A session exists only once its API key has been validated.
 */
export interface ReviewSession {
  id: string;
  createdAt: Date;
  apiKey: string;
  extracted: KycRecord | null;
  working: WorkingRecord | null;
  sourceFileName: string | null;
  attempts: BackendAttempt[];
  errors: string[];
}

export type FieldEdits = Record<string, string | null>;

export interface SessionSummary {
  confidenceScore: number | null;
  confidenceDisplay: string;
  modelUsed: string;
}

export interface FormSectionView {
  id: string;
  title: string;
  fields: { field: KycTextField; label: string; value: string }[];
}

export interface TableRow {
  field: string;
  value: string;
}

export function createSession(apiKey: string): ReviewSession {
  return {
    id: uuidv4(),
    createdAt: new Date(),
    apiKey,
    extracted: null,
    working: null,
    sourceFileName: null,
    attempts: [],
    errors: [],
  };
}

/** Records the outcome of an extraction run; a found record becomes the new working copy. */
export function startReview(session: ReviewSession, result: ExtractionResult, sourceFileName: string | null): void {
  session.attempts = result.attempts;
  session.errors = result.errors;
  session.sourceFileName = sourceFileName;
  session.extracted = result.record;
  session.working = result.record ? { ...result.record } : null;
}

export function requireWorking(session: ReviewSession): WorkingRecord {
  if (!session.working) {
    throw new NoRecordError();
  }
  return session.working;
}

function normalizeInput(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

/**
 * Rebuilds the working copy the way the review form does on every refresh: each section
 * field already in the copy takes its edited value (or keeps its current one), the
 * document title and society name are carried over, and confidence and model metadata
 * are dropped. Blank values become null.
 */
export function applyEdits(session: ReviewSession, edits: FieldEdits): WorkingRecord {
  const current = requireWorking(session);

  const rejected = Object.keys(edits).filter((field) => !isEditableField(field));
  if (rejected.length > 0) {
    throw new InvalidEditError(rejected);
  }

  const next: WorkingRecord = {};
  for (const section of FORM_SECTIONS) {
    for (const field of section.fields) {
      if (!(field in current)) continue;
      const value = Object.prototype.hasOwnProperty.call(edits, field) ? edits[field] : current[field];
      next[field] = normalizeInput(value);
    }
  }
  for (const field of PASSTHROUGH_FIELDS) {
    next[field] = current[field] ?? null;
  }

  session.working = next;
  return next;
}

export function summarize(session: ReviewSession): SessionSummary {
  const confidenceScore = session.extracted?.confidence_score ?? null;
  return {
    confidenceScore,
    confidenceDisplay: confidenceScore ? confidenceScore.toFixed(2) : 'N/A',
    modelUsed: session.extracted?.model_used ?? 'Unknown',
  };
}

export function toFormSections(working: WorkingRecord): FormSectionView[] {
  return FORM_SECTIONS.map((section) => ({
    id: section.id,
    title: section.title,
    fields: section.fields
      .filter((field) => field in working)
      .map((field) => ({ field, label: fieldLabel(field), value: working[field] ?? '' })),
  }));
}

export function toTableView(working: WorkingRecord): TableRow[] {
  return Object.entries(working).map(([field, value]) => ({
    field: fieldLabel(field),
    value: value === null || value === undefined ? '' : String(value),
  }));
}

export function toJsonExport(working: WorkingRecord): string {
  return JSON.stringify(working, null, 2);
}

export function exportFileName(sourceFileName: string | null, kind: 'json' | 'xlsx'): string {
  if (!sourceFileName) {
    return kind === 'json' ? 'extracted_kyc_data.json' : 'kyc_record.xlsx';
  }
  const stem = sourceFileName.split('.')[0] || 'kyc';
  return kind === 'json' ? `${stem}_extracted.json` : `${stem}_kyc.xlsx`;
}
