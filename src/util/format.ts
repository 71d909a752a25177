export function formatHex(value: number, width: number = 8): string {
    return '0x' + value.toString(16).toUpperCase().padStart(width, '0');
}

/**
 * Marker label for an address: uppercase hex padded to a whole number of
 * 4-digit clusters (at least two), clusters joined with '_'.
 *   0x40000     → "0x0004_0000"
 *   0x123456789 → "0x0001_2345_6789"
 */
export function formatAddress(value: number): string {
    const digits = value.toString(16).toUpperCase();
    const width = Math.max(8, Math.ceil(digits.length / 4) * 4);
    const padded = digits.padStart(width, '0');
    return '0x' + padded.replace(/(.{4})(?=.)/g, '$1_');
}

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

export function formatSize(bytes: number): string {
    let value = bytes;
    let unit = 0;
    while (value >= 1024 && unit < SIZE_UNITS.length - 1) {
        value /= 1024;
        unit++;
    }
    const text = unit === 0 ? value.toFixed(0) : value.toFixed(2);
    return `${text} ${SIZE_UNITS[unit]}`;
}

/**
 * Parse an integer field of a description. Accepts numbers, hex ("0x1F"),
 * decimal ("4096") and K/M suffixed sizes ("64K"). Returns undefined when the
 * value is not a non-negative safe integer.
 */
export function parseNumber(value: number | string): number | undefined {
    if (typeof value === 'number') {
        return Number.isSafeInteger(value) && value >= 0 ? value : undefined;
    }

    const trimmed = value.trim();
    let parsed: number | undefined;

    if (/^0x[0-9a-f]+$/i.test(trimmed)) {
        parsed = parseInt(trimmed.substring(2), 16);
    } else if (/^\d+$/.test(trimmed)) {
        parsed = parseInt(trimmed, 10);
    } else {
        // Number with K/M suffix
        const match = trimmed.match(/^(\d+)\s*([KkMm])$/);
        if (match) {
            const num = parseInt(match[1], 10);
            const suffix = match[2].toUpperCase();
            parsed = suffix === 'K' ? num * 1024 : num * 1024 * 1024;
        }
    }

    if (parsed === undefined || !Number.isSafeInteger(parsed)) { return undefined; }
    return parsed;
}
