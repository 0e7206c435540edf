/**
 * Encoder - serial number to printable label images
 *
 * Two independent entry points (QR and Code128) with no shared state, plus a
 * renderer that runs both on the bounded pool and joins them.
 */

import { generateBarcode, generateQr } from '@src/lib/encoder/label.js';
import { RenderPool } from '@src/lib/encoder/render-pool.js';
import { normalizeSerial } from '@src/lib/encoder/serial.js';

export { barcodeSvg } from '@src/lib/encoder/barcode.js';
export { qrSvg } from '@src/lib/encoder/qr.js';
export { generateBarcode, generateQr } from '@src/lib/encoder/label.js';
export { CANVAS_WIDTH, QR_LAYOUT, BARCODE_LAYOUT } from '@src/lib/encoder/canvas.js';
export { RenderPool } from '@src/lib/encoder/render-pool.js';
export { normalizeSerial, serialFileName, CODE_KINDS, type CodeKind } from '@src/lib/encoder/serial.js';

export interface RenderedLabels {
    qr: Buffer;
    barcode: Buffer;
}

export interface LabelRenderer {
    render(serial: string): Promise<RenderedLabels>;
}

export interface LabelGenerators {
    qr: (serial: string) => Promise<Buffer>;
    barcode: (serial: string) => Promise<Buffer>;
}

const DEFAULT_GENERATORS: LabelGenerators = {
    qr: generateQr,
    barcode: generateBarcode,
};

/**
 * Renders both labels as two pool tasks joined by Promise.all: the first
 * failure rejects the whole render and no partial result is returned.
 */
export class PooledLabelRenderer implements LabelRenderer {
    constructor(
        private readonly pool: RenderPool,
        private readonly generators: LabelGenerators = DEFAULT_GENERATORS
    ) {}

    async render(input: string): Promise<RenderedLabels> {
        const serial = normalizeSerial(input);
        const [qr, barcode] = await Promise.all([
            this.pool.run(() => this.generators.qr(serial)),
            this.pool.run(() => this.generators.barcode(serial)),
        ]);
        return { qr, barcode };
    }
}
