/**
 * Label canvas
 *
 * Every label is a fixed-width white PNG: the symbol is fitted (aspect kept)
 * into the box above, the serial is printed centered underneath.
 *
 *   +--------------------------- 900 ---------------------------+
 *   |  padding                                                   |
 *   |        [ code box: width - 2*padding, fitted + centered ]  |
 *   |  padding                                                   |
 *   |                     caption (serial)                       |
 *   +------------------------------------------------------------+
 */

import sharp from 'sharp';

export const CANVAS_WIDTH = 900;

const WHITE = { r: 255, g: 255, b: 255, alpha: 1 };

export interface CanvasLayout {
    width: number;
    height: number;
    padding: number;
    captionHeight: number;
    fontSize: number;
}

export const QR_LAYOUT: CanvasLayout = {
    width: CANVAS_WIDTH,
    height: 1040,
    padding: 40,
    captionHeight: 140,
    fontSize: 64,
};

export const BARCODE_LAYOUT: CanvasLayout = {
    width: CANVAS_WIDTH,
    height: 480,
    padding: 40,
    captionHeight: 120,
    fontSize: 56,
};

export interface Box {
    left: number;
    top: number;
    width: number;
    height: number;
}

export function codeBox(layout: CanvasLayout): Box {
    return {
        left: layout.padding,
        top: layout.padding,
        width: layout.width - layout.padding * 2,
        height: layout.height - layout.padding * 2 - layout.captionHeight,
    };
}

export function escapeXml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#39;');
}

/**
 * Font size that keeps a monospace caption inside the canvas
 * (a monospace glyph is roughly 0.6em wide)
 */
export function captionFontSize(caption: string, layout: CanvasLayout): number {
    const usable = layout.width - layout.padding * 2;
    const fitted = Math.floor(usable / (Math.max(caption.length, 1) * 0.6));
    return Math.max(8, Math.min(layout.fontSize, fitted));
}

export function captionSvg(caption: string, layout: CanvasLayout): string {
    const fontSize = captionFontSize(caption, layout);
    const baseline = Math.round(layout.captionHeight / 2 + fontSize / 3);
    return [
        `<svg xmlns="http://www.w3.org/2000/svg" width="${layout.width}" height="${layout.captionHeight}">`,
        `<text x="${layout.width / 2}" y="${baseline}" text-anchor="middle" font-family="DejaVu Sans Mono, Menlo, Consolas, monospace" font-size="${fontSize}" fill="#000000">`,
        escapeXml(caption),
        '</text></svg>',
    ].join('');
}

/**
 * Rasterise the symbol SVG, center it in the code box and print the caption below
 */
export async function composeLabel(codeSvg: string, caption: string, layout: CanvasLayout): Promise<Buffer> {
    const box = codeBox(layout);

    const code = await sharp(Buffer.from(codeSvg))
        .resize({ width: box.width, height: box.height, fit: 'inside', kernel: 'nearest' })
        .flatten({ background: WHITE })
        .png()
        .toBuffer({ resolveWithObject: true });

    const left = box.left + Math.floor((box.width - code.info.width) / 2);
    const top = box.top + Math.floor((box.height - code.info.height) / 2);

    return sharp({
        create: { width: layout.width, height: layout.height, channels: 3, background: WHITE },
    })
        .composite([
            { input: code.data, left, top },
            { input: Buffer.from(captionSvg(caption, layout)), left: 0, top: layout.height - layout.captionHeight },
        ])
        .png()
        .toBuffer();
}
