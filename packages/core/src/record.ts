import { z } from 'zod';

export const CONTACT_RECORD_COLUMNS = [
  'NGO Name',
  'Website',
  'Address',
  'Services Offered',
  'Contact Person',
  'Contact Number',
  'Source Pages'
] as const;

export type ContactRecordField = (typeof CONTACT_RECORD_COLUMNS)[number];

const requiredText = z
  .string()
  .refine((value) => value.trim().length > 0, { message: 'Value must not be blank' });

export const ContactRecordSchema = z
  .object({
    'NGO Name': requiredText,
    Website: z.string().url(),
    Address: requiredText,
    'Services Offered': requiredText,
    'Contact Person': requiredText,
    'Contact Number': requiredText,
    'Source Pages': requiredText
  })
  .strict();

export type ContactRecord = Readonly<z.infer<typeof ContactRecordSchema>>;

export function toRow(record: ContactRecord): readonly string[] {
  return CONTACT_RECORD_COLUMNS.map((column) => record[column]);
}
