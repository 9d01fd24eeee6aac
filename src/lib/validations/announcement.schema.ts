/**
 * @fileoverview Zod schemas for announcement forms and stored records.
 * @module lib/validations/announcement.schema
 */
import { z } from 'zod';
import { APP_CONFIG } from '@/lib/constants/config';
import { parseIsoTimestamp } from '@/lib/utils/dates';
import type {
  AnnouncementField,
  AnnouncementRecord,
  FieldErrors,
  SubmittedValues,
} from '@/types/announcement';

const requiredText = (label: string) =>
  z
    .string({ required_error: `${label} is required`, invalid_type_error: `${label} must be text` })
    .trim()
    .min(1, `${label} is required`);

const isoTimestamp = (label: string) =>
  requiredText(label).refine((value) => parseIsoTimestamp(value) !== null, {
    message: `${label} must be an ISO-8601 timestamp`,
  });

/** Blank strings and null both mean "not provided". */
const optionalText = z
  .string()
  .trim()
  .nullish()
  .transform((value) => (value ? value : undefined));

/**
 * Staff form (create and edit). Description truncation and color defaults
 * are applied by the service, not here.
 */
export const announcementFormSchema = z
  .object({
    title: requiredText('Title'),
    description: requiredText('Description'),
    start_date: isoTimestamp('Start date'),
    end_date: isoTimestamp('End date'),
    color: optionalText,
    link: optionalText,
  })
  .superRefine((form, ctx) => {
    const start = parseIsoTimestamp(form.start_date);
    const end = parseIsoTimestamp(form.end_date);
    if (start === null || end === null) return;
    if (end <= start) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['end_date'],
        message: 'End date must be after start date',
      });
    }
  });

export type AnnouncementFormValues = z.infer<typeof announcementFormSchema>;

/**
 * Shape of a record at the storage boundary. Older files carry `link: null`;
 * it is read back as absent.
 */
export const storedAnnouncementSchema = z.object({
  title: z.string().min(1),
  description: z.string().min(1),
  start_date: z.string().min(1),
  end_date: z.string().min(1),
  color: z
    .string()
    .nullish()
    .transform((value) => value || APP_CONFIG.defaultAnnouncementColor),
  link: z
    .string()
    .nullish()
    .transform((value) => (value ? value : undefined)),
  created_by: z.string().min(1),
  created_at: z.string().min(1),
  updated_at: z
    .string()
    .nullish()
    .transform((value) => (value ? value : undefined)),
});

/* ─── Helpers ─── */

const FORM_FIELDS: readonly AnnouncementField[] = [
  'title',
  'description',
  'start_date',
  'end_date',
  'color',
  'link',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** The string fields the caller sent, untouched, for re-displaying a form. */
export function pickSubmittedValues(input: unknown): SubmittedValues {
  const values: SubmittedValues = {};
  if (!isRecord(input)) return values;
  for (const field of FORM_FIELDS) {
    const value = input[field];
    if (typeof value === 'string') values[field] = value;
  }
  return values;
}

export type FormParseResult =
  | { success: true; data: AnnouncementFormValues }
  | { success: false; fieldErrors: FieldErrors; values: SubmittedValues };

export function parseAnnouncementForm(input: unknown): FormParseResult {
  const parsed = announcementFormSchema.safeParse(isRecord(input) ? input : {});
  if (parsed.success) return { success: true, data: parsed.data };

  return {
    success: false,
    fieldErrors: parsed.error.flatten().fieldErrors,
    values: pickSubmittedValues(input),
  };
}

export type StoredParseResult =
  | { success: true; record: AnnouncementRecord }
  | { success: false; reason: string };

export function parseStoredAnnouncement(payload: unknown): StoredParseResult {
  const parsed = storedAnnouncementSchema.safeParse(payload);
  if (parsed.success) return { success: true, record: parsed.data };

  const reason = parsed.error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
  return { success: false, reason };
}
