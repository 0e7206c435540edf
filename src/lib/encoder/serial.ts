import { InvalidSerialError } from '@src/lib/errors/bot-errors.js';

export type CodeKind = 'qr' | 'barcode';

export const CODE_KINDS: readonly CodeKind[] = ['qr', 'barcode'];

/**
 * Trim the user's text; an empty result cannot be encoded by either symbology
 */
export function normalizeSerial(input: string): string {
    const serial = input.trim();
    if (!serial) {
        throw new InvalidSerialError();
    }
    return serial;
}

/**
 * Attachment name for a rendered label, e.g. "SN-001_qr.png"
 */
export function serialFileName(serial: string, kind: CodeKind): string {
    const safe = serial.replace(/[^A-Za-z0-9._-]+/g, '_');
    return `${safe}_${kind}.png`;
}
