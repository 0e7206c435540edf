/**
 * Code128 symbol generation via bwip-js
 *
 * Shared with the print page bundle, which resolves bwip-js to its browser build.
 */

import bwipjs from 'bwip-js';
import { EncodeError } from '@src/lib/errors/bot-errors.js';
import { normalizeSerial } from '@src/lib/encoder/serial.js';

/**
 * Code128 barcode as SVG. Human-readable text is left out: the label canvas
 * (and the print page caption) render the serial themselves.
 */
export function barcodeSvg(input: string): string {
    const serial = normalizeSerial(input);
    try {
        return bwipjs.toSVG({
            bcid: 'code128',
            text: serial,
            scale: 3,
            height: 18,
            includetext: false,
            backgroundcolor: 'FFFFFF',
        });
    } catch (error) {
        throw new EncodeError('barcode', error);
    }
}
