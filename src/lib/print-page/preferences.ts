/**
 * Print page preferences: which symbol is shown and the label size.
 * The browser keeps both in localStorage under STORAGE_KEYS.
 */

import type { CodeKind } from '@src/lib/encoder/serial.js';

export interface LabelSize {
    id: string;
    label: string;
    width: string;
    height: string;
}

export const LABEL_SIZES: readonly LabelSize[] = [
    { id: '58x40', label: '58 × 40 mm', width: '58mm', height: '40mm' },
    { id: '100x70', label: '100 × 70 mm', width: '100mm', height: '70mm' },
];

export const MODES: readonly { id: CodeKind; label: string }[] = [
    { id: 'qr', label: 'QR code' },
    { id: 'barcode', label: 'Barcode' },
];

export const STORAGE_KEYS = {
    mode: 'printPage.mode',
    size: 'printPage.size',
} as const;

export const DEFAULT_MODE: CodeKind = 'qr';
export const DEFAULT_SIZE = LABEL_SIZES[0].id;

/**
 * CSS injected right before window.print(): page box equals the label, no margins
 */
export function pageSizeCss(size: LabelSize): string {
    return [
        `@page { size: ${size.width} ${size.height}; margin: 0; }`,
        '@media print {',
        '  html, body { margin: 0; padding: 0; }',
        '  .toolbar { display: none; }',
        `  .label { width: ${size.width}; height: ${size.height}; margin: 0; border: 0; page-break-after: avoid; }`,
        '}',
    ].join('\n');
}
