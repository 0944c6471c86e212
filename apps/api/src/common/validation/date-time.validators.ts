import { buildMessage, isISO8601, ValidateBy, ValidationOptions } from 'class-validator';

const CALENDAR_DATE_PREFIX = /^\d{4}-\d{2}-\d{2}(?:$|T)/;

/**
 * ISO-8601 calendar date or date-time that resolves to a real instant.
 * Week dates (2026-W10) and ordinal dates (2026-060) pass isISO8601 and are
 * rejected here.
 */
export function isCalendarDateTime(value: unknown): value is string {
  return (
    typeof value === 'string' &&
    CALENDAR_DATE_PREFIX.test(value) &&
    isISO8601(value, { strict: true }) &&
    Number.isFinite(Date.parse(value))
  );
}

/**
 * Calendar date-time string or finite epoch milliseconds.
 */
export function isHistoryTimestamp(value: unknown): value is string | number {
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  return isCalendarDateTime(value);
}

export function IsCalendarDateTime(validationOptions?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: 'isCalendarDateTime',
      validator: {
        validate: (value: unknown): boolean => isCalendarDateTime(value),
        defaultMessage: buildMessage(
          (eachPrefix) => `${eachPrefix}$property must be an ISO 8601 calendar date or date-time`,
          validationOptions,
        ),
      },
    },
    validationOptions,
  );
}

export function IsHistoryTimestamp(validationOptions?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: 'isHistoryTimestamp',
      validator: {
        validate: (value: unknown): boolean => isHistoryTimestamp(value),
        defaultMessage: buildMessage(
          (eachPrefix) =>
            `${eachPrefix}$property must be an ISO 8601 calendar date-time or epoch milliseconds`,
          validationOptions,
        ),
      },
    },
    validationOptions,
  );
}
