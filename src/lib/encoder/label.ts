/**
 * Label PNGs: symbol SVG composed onto the 900px canvas with the serial below
 */

import { barcodeSvg } from '@src/lib/encoder/barcode.js';
import { BARCODE_LAYOUT, composeLabel, QR_LAYOUT } from '@src/lib/encoder/canvas.js';
import { qrSvg } from '@src/lib/encoder/qr.js';
import { normalizeSerial } from '@src/lib/encoder/serial.js';

export async function generateQr(input: string): Promise<Buffer> {
    const serial = normalizeSerial(input);
    return composeLabel(qrSvg(serial), serial, QR_LAYOUT);
}

export async function generateBarcode(input: string): Promise<Buffer> {
    const serial = normalizeSerial(input);
    return composeLabel(barcodeSvg(serial), serial, BARCODE_LAYOUT);
}
