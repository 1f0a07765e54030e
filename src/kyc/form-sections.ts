import type { KycTextField } from './record-schema';

export interface FormSection {
  id: 'personal' | 'employment' | 'address' | 'banking' | 'nominee';
  title: string;
  fields: KycTextField[];
}

export const FORM_SECTIONS: readonly FormSection[] = [
  {
    id: 'personal',
    title: 'Personal & Identity',
    fields: ['name', 'father_husband_name', 'date_of_birth', 'mobile_number', 'pan_number', 'aadhar_number'],
  },
  {
    id: 'employment',
    title: 'Employment Details',
    fields: ['control_number', 'designation', 'bill_unit_number', 'department', 'sr_number', 'date_of_appointment'],
  },
  {
    id: 'address',
    title: 'Address Information',
    fields: ['office_address', 'residential_address'],
  },
  {
    id: 'banking',
    title: 'Banking Details',
    fields: ['bank_name', 'branch_name', 'branch_code', 'account_number', 'ifsc_code'],
  },
  {
    id: 'nominee',
    title: 'Nominee Details',
    fields: ['nominee_name', 'nominee_relation', 'nominee_dob', 'nominee_aadhar', 'nominee_pan'],
  },
];

/** Carried through an edit untouched; they are never shown as inputs. */
export const PASSTHROUGH_FIELDS = ['document_title', 'society_name'] as const satisfies readonly KycTextField[];

export function editableFields(): KycTextField[] {
  return FORM_SECTIONS.flatMap((section) => section.fields);
}

export function isEditableField(field: string): field is KycTextField {
  return editableFields().some((editable) => editable === field);
}
