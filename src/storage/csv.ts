/**
 * Minimal RFC 4180 CSV codec
 */

const NEEDS_QUOTING = /[",\r\n]/;

function encodeField(value: string): string {
    return NEEDS_QUOTING.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Serialize rows to CSV text with a trailing newline
 */
export function stringifyCsv(rows: readonly (readonly string[])[]): string {
    if (rows.length === 0) {
        return '';
    }
    return rows.map(row => row.map(encodeField).join(',')).join('\n') + '\n';
}

/**
 * Parse CSV text into rows. Quoted fields may contain commas, quotes and newlines.
 */
export function parseCsv(text: string): string[][] {
    const rows: string[][] = [];
    let row: string[] = [];
    let field = '';
    let inQuotes = false;
    let i = 0;

    while (i < text.length) {
        const char = text[i];

        if (inQuotes) {
            if (char === '"') {
                if (text[i + 1] === '"') {
                    field += '"';
                    i += 2;
                    continue;
                }
                inQuotes = false;
                i++;
                continue;
            }
            field += char;
            i++;
            continue;
        }

        if (char === '"') {
            inQuotes = true;
        } else if (char === ',') {
            row.push(field);
            field = '';
        } else if (char === '\n' || char === '\r') {
            row.push(field);
            rows.push(row);
            row = [];
            field = '';
            if (char === '\r' && text[i + 1] === '\n') {
                i++;
            }
        } else {
            field += char;
        }
        i++;
    }

    if (inQuotes) {
        throw new Error('Unterminated quoted field in CSV input');
    }

    // Last line without a trailing newline
    if (field !== '' || row.length > 0) {
        row.push(field);
        rows.push(row);
    }

    return rows;
}
