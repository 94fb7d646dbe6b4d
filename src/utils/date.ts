const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Calendar date (UTC) as YYYY-MM-DD
 */
export function toIsoDate(date: Date): string {
    return date.toISOString().slice(0, 10);
}

/**
 * True for a real YYYY-MM-DD calendar date (rejects 2024-02-30)
 */
export function isIsoCalendarDate(value: string): boolean {
    const match = ISO_DATE_PATTERN.exec(value);
    if (!match) {
        return false;
    }
    const parsed = new Date(`${value}T00:00:00Z`);
    return !Number.isNaN(parsed.getTime()) && toIsoDate(parsed) === value;
}
