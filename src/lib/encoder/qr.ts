/**
 * QR symbol generation
 *
 * The `qr` package produces the module matrix; the SVG is assembled here so
 * the same markup serves both the PNG renderer and the print page. No Node
 * imports: this module is bundled into the print page script.
 */

import encodeQR from 'qr';
import { EncodeError } from '@src/lib/errors/bot-errors.js';
import { normalizeSerial } from '@src/lib/encoder/serial.js';

/** Quiet zone in modules; the canvas padding adds more white around it */
const QR_BORDER = 2;

function qrMatrix(serial: string): boolean[][] {
    try {
        return encodeQR(serial, 'raw', { ecc: 'medium', border: QR_BORDER });
    } catch (error) {
        throw new EncodeError('qr', error);
    }
}

/**
 * QR code (error correction level M) as a standalone SVG, one unit per module
 */
export function qrSvg(input: string): string {
    const serial = normalizeSerial(input);
    const matrix = qrMatrix(serial);
    const size = matrix.length;

    const modules: string[] = [];
    matrix.forEach((row, y) => {
        row.forEach((dark, x) => {
            if (dark) {
                modules.push(`M${x} ${y}h1v1h-1z`);
            }
        });
    });

    return [
        `<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${size} ${size}" width="${size}" height="${size}" shape-rendering="crispEdges">`,
        `<rect width="${size}" height="${size}" fill="#ffffff"/>`,
        `<path fill="#000000" d="${modules.join('')}"/>`,
        '</svg>',
    ].join('');
}
