import { z } from 'zod';
import { Type } from '@google/genai';
import type { Schema } from '@google/genai';

const text = z.string().nullable().catch(null);

/**
 * The closed KYC record. Parsing fills every missing field with null, turns values of
 * the wrong type into null and strips unknown keys. Values are not format-checked.
 */
export const kycRecordSchema = z.object({
  document_title: text,
  society_name: text,
  control_number: text,
  name: text,
  father_husband_name: text,
  designation: text,
  bill_unit_number: text,
  department: text,
  sr_number: text,
  office_address: text,
  residential_address: text,
  date_of_birth: text,
  date_of_appointment: text,
  mobile_number: text,
  pan_number: text,
  aadhar_number: text,
  bank_name: text,
  branch_name: text,
  branch_code: text,
  account_number: text,
  ifsc_code: text,
  nominee_name: text,
  nominee_relation: text,
  nominee_dob: text,
  nominee_aadhar: text,
  nominee_pan: text,
  confidence_score: z.number().finite().nullable().catch(null),
  model_used: text,
});

export type KycRecord = z.infer<typeof kycRecordSchema>;
export type KycField = keyof KycRecord;
export type KycTextField = Exclude<KycField, 'confidence_score' | 'model_used'>;

/** What the review flow holds: any subset of the record's fields. */
export type WorkingRecord = Partial<KycRecord>;

// Column order of the store file and of every export; appends depend on it.
const KYC_FIELDS = [
  'document_title',
  'society_name',
  'control_number',
  'name',
  'father_husband_name',
  'designation',
  'bill_unit_number',
  'department',
  'sr_number',
  'office_address',
  'residential_address',
  'date_of_birth',
  'date_of_appointment',
  'mobile_number',
  'pan_number',
  'aadhar_number',
  'bank_name',
  'branch_name',
  'branch_code',
  'account_number',
  'ifsc_code',
  'nominee_name',
  'nominee_relation',
  'nominee_dob',
  'nominee_aadhar',
  'nominee_pan',
  'confidence_score',
  'model_used',
] as const satisfies readonly KycField[];

export function fieldNames(): KycField[] {
  return [...KYC_FIELDS];
}

export function isKycField(value: string): value is KycField {
  return KYC_FIELDS.some((field) => field === value);
}

export function emptyRecord(): KycRecord {
  return kycRecordSchema.parse({});
}

export function coerceRecord(input: Record<string, unknown>): KycRecord {
  return kycRecordSchema.parse(input);
}

export function fieldLabel(field: string): string {
  return field
    .split('_')
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1).toLowerCase())
    .join(' ');
}

function buildResponseSchema(): Schema {
  const properties: Record<string, Schema> = {};
  for (const field of KYC_FIELDS) {
    properties[field] =
      field === 'confidence_score'
        ? { type: Type.NUMBER, nullable: true, minimum: 0, maximum: 1 }
        : { type: Type.STRING, nullable: true };
  }
  return {
    type: Type.OBJECT,
    properties,
    required: fieldNames(),
    propertyOrdering: fieldNames(),
  };
}

/** Structured-output shape sent with every extraction call. */
export const geminiResponseSchema: Schema = buildResponseSchema();
