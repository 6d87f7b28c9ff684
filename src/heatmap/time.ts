/**
 * Strict ISO 8601 parsing, independent of the host time zone.
 * A time without offset is read as UTC; impossible calendar dates are rejected.
 */

const ISO_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:T(\d{2}):(\d{2})(?::(\d{2})(\.\d{1,9})?)?(Z|[+-]\d{2}(?::?\d{2})?)?)?$/;

function daysInMonth(year: number, month: number): number {
    return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function normalizeOffset(offset: string | undefined): string {
    if (offset === undefined || offset === 'Z') return 'Z';
    const sign = offset[0];
    const digits = offset.slice(1).replace(':', '');
    return `${sign}${digits.slice(0, 2)}:${digits.slice(2, 4) || '00'}`;
}

/**
 * Returns undefined when `value` is not a valid ISO 8601 date or date-time
 */
export function parseIsoTimestamp(value: string): Date | undefined {
    const match = ISO_PATTERN.exec(value.trim());
    if (!match) return undefined;

    const [, y, mo, d, h = '00', mi = '00', s = '00', fraction = '', offset] = match;
    const year = Number(y);
    const month = Number(mo);
    const day = Number(d);

    if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) return undefined;
    if (Number(h) > 23 || Number(mi) > 59 || Number(s) > 59) return undefined;

    // Date only keeps millisecond precision
    const millis = fraction ? fraction.slice(0, 4).padEnd(4, '0') : '';
    const parsed = new Date(`${y}-${mo}-${d}T${h}:${mi}:${s}${millis}${normalizeOffset(offset)}`);
    return isNaN(parsed.getTime()) ? undefined : parsed;
}
