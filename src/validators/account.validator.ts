import { z } from 'zod';
import { AccountInput } from '@/models';
import { DataValidationError, FieldError, ValidationError } from '@/errors';
import { ACCOUNT_LIMITS } from '@/config/limits';

const CALENDAR_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * True for an existing YYYY-MM-DD date (rejects 2024-02-30, 2024-13-01)
 * Year 0000 exists in JS dates but not in PostgreSQL's calendar.
 */
export function isCalendarDate(value: string): boolean {
  if (!CALENDAR_DATE.test(value)) {
    return false;
  }
  const parsed = new Date(`${value}T00:00:00Z`);
  return (
    !Number.isNaN(parsed.getTime()) &&
    parsed.getUTCFullYear() >= 1 &&
    parsed.toISOString().slice(0, 10) === value
  );
}

function maxLengthMessage(max: number): string {
  return `Must be at most ${max} characters`;
}

/**
 * Account payload schema (wire format, snake_case)
 *
 * - name and email are required and non-empty
 * - string lengths fit the table columns
 * - address, phone_number and date_joined are optional; null counts as absent
 * - id and unknown keys are stripped
 */
const accountPayloadSchema = z
  .object({
    name: z
      .string()
      .min(1, 'Name must not be empty')
      .max(ACCOUNT_LIMITS.NAME_MAX_LENGTH, maxLengthMessage(ACCOUNT_LIMITS.NAME_MAX_LENGTH)),
    email: z
      .string()
      .min(1, 'Email must not be empty')
      .max(ACCOUNT_LIMITS.EMAIL_MAX_LENGTH, maxLengthMessage(ACCOUNT_LIMITS.EMAIL_MAX_LENGTH)),
    address: z
      .string()
      .max(ACCOUNT_LIMITS.ADDRESS_MAX_LENGTH, maxLengthMessage(ACCOUNT_LIMITS.ADDRESS_MAX_LENGTH))
      .nullish(),
    phone_number: z
      .string()
      .max(
        ACCOUNT_LIMITS.PHONE_NUMBER_MAX_LENGTH,
        maxLengthMessage(ACCOUNT_LIMITS.PHONE_NUMBER_MAX_LENGTH)
      )
      .nullish(),
    date_joined: z
      .string()
      .refine(isCalendarDate, { message: 'Must be a calendar date in YYYY-MM-DD format' })
      .nullish(),
  })
  .transform(
    (data): AccountInput => ({
      name: data.name,
      email: data.email,
      address: data.address ?? undefined,
      phoneNumber: data.phone_number ?? undefined,
      dateJoined: data.date_joined ?? undefined,
    })
  );

function toFieldErrors(error: z.ZodError): FieldError[] {
  return error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Turn a parsed JSON body into validated account input
 *
 * @throws DataValidationError when the body is not a JSON object
 * @throws ValidationError listing every missing or invalid field
 */
export function deserializeAccount(payload: unknown): AccountInput {
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    throw new DataValidationError('Invalid Account: body of request contained bad or no data');
  }

  const result = accountPayloadSchema.safeParse(payload);
  if (!result.success) {
    throw new ValidationError('Invalid Account', toFieldErrors(result.error));
  }

  return result.data;
}
