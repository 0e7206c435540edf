import { beforeAll, describe, it, expect, vi } from 'vitest';
import { TextEncoder } from 'util';
import { JSDOM } from 'jsdom';
import { MISSING_DATA_MESSAGE } from '@src/lib/print-page/client.js';
import { PRINT_SCRIPT_NAME, printPageHtml, printPageScript } from '@src/lib/print-page/bundle.js';
import { LABEL_SIZES, STORAGE_KEYS, pageSizeCss } from '@src/lib/print-page/preferences.js';

const PAGE_URL = 'https://labels.example.com/print';

interface PageOptions {
    stored?: Record<string, string>;
    telegram?: boolean;
}

let staticHtml: string;
let pageHtml: string;

beforeAll(async () => {
    staticHtml = await printPageHtml();
    const script = await printPageScript();
    // jsdom loads no external scripts; inline the bundle where the page references it
    pageHtml = staticHtml.replace(`<script src="${PRINT_SCRIPT_NAME}"></script>`, () => `<script>${script}</script>`);
});

/**
 * Load the static page at `?<query>` and run its bundled script
 */
function openPage(query: string, options: PageOptions = {}) {
    const print = vi.fn();
    const ready = vi.fn();
    const expand = vi.fn();

    const dom = new JSDOM(pageHtml, {
        url: `${PAGE_URL}${query}`,
        runScripts: 'dangerously',
        beforeParse(window) {
            if (!('TextEncoder' in window)) {
                Object.defineProperty(window, 'TextEncoder', { value: TextEncoder });
            }
            for (const [key, value] of Object.entries(options.stored ?? {})) {
                window.localStorage.setItem(key, value);
            }
            window.print = print;
            if (options.telegram) {
                Object.assign(window, { Telegram: { WebApp: { ready, expand } } });
            }
        },
    });
    const document = dom.window.document;

    function figure(code: string): HTMLElement {
        const element = document.querySelector<HTMLElement>(`.label[data-code="${code}"]`);
        if (!element) {
            throw new Error(`No ${code} label`);
        }
        return element;
    }

    function click(selector: string): void {
        const element = document.querySelector<HTMLElement>(selector);
        if (!element) {
            throw new Error(`No element for ${selector}`);
        }
        element.click();
    }

    return { dom, document, window: dom.window, print, ready, expand, figure, click };
}

describe('print page assets', () => {
    it('should serve static HTML that loads its script by relative name', () => {
        expect(staticHtml).toContain('<script src="print.js"></script>');
        expect(staticHtml).toContain('<figure class="label" data-code="qr"><figcaption></figcaption></figure>');
        expect(staticHtml).toContain('<style id="print-page-size"></style>');
    });

    it('should bundle the client into one self-contained script', async () => {
        const script = await printPageScript();

        expect(script.trimEnd().endsWith('})();')).toBe(true);
        expect(await printPageScript()).toBe(script);
    });
});

describe('print page', () => {
    it('should draw ABC123 from the query string as a QR code', () => {
        const page = openPage('?data=ABC123');
        const svg = page.figure('qr').querySelector('svg');

        expect(svg?.getAttribute('viewBox')).toMatch(/^0 0 (\d+) \1$/);
        expect(page.figure('qr').querySelector('figcaption')?.textContent).toBe('ABC123');
        expect(page.document.title).toBe('Print ABC123');
        expect(page.document.body.getAttribute('data-serial')).toBe('ABC123');
        expect(page.document.getElementById('status')?.hidden).toBe(true);
    });

    it('should draw the barcode alongside, hidden until selected', () => {
        const page = openPage('?data=ABC123');

        expect(page.figure('barcode').querySelector('svg')).not.toBeNull();
        expect(page.figure('barcode').querySelector('figcaption')?.textContent).toBe('ABC123');
        expect(page.figure('barcode').hidden).toBe(true);
    });

    it('should show the QR label at 58 x 40 mm by default', () => {
        const page = openPage('?data=ABC123');

        expect(page.figure('qr').hidden).toBe(false);
        expect(page.figure('qr').style.width).toBe('58mm');
        expect(page.figure('qr').style.height).toBe('40mm');
        expect(page.document.body.getAttribute('data-mode')).toBe('qr');
        expect(page.document.body.getAttribute('data-size')).toBe('58x40');
        expect(page.document.querySelector('[data-mode="qr"]')?.getAttribute('aria-pressed')).toBe('true');
        expect(page.document.querySelector('[data-mode="barcode"]')?.getAttribute('aria-pressed')).toBe('false');
    });

    it('should build one toggle button per mode and size', () => {
        const page = openPage('?data=ABC123');
        const labels = (selector: string) =>
            Array.from(page.document.querySelectorAll(selector)).map((button) => button.textContent);

        expect(labels('#mode-buttons button')).toEqual(['QR code', 'Barcode']);
        expect(labels('#size-buttons button')).toEqual(['58 × 40 mm', '100 × 70 mm']);
    });

    it('should switch to the barcode without reloading', () => {
        const page = openPage('?data=ABC123');
        const before = page.window.location.href;

        page.click('[data-mode="barcode"]');

        expect(page.figure('qr').hidden).toBe(true);
        expect(page.figure('barcode').hidden).toBe(false);
        expect(page.window.location.href).toBe(before);
        expect(page.window.localStorage.getItem(STORAGE_KEYS.mode)).toBe('barcode');
    });

    it('should resize labels and remember the size', () => {
        const page = openPage('?data=ABC123');

        page.click('[data-size="100x70"]');

        expect(page.figure('qr').style.width).toBe('100mm');
        expect(page.figure('qr').style.height).toBe('70mm');
        expect(page.figure('barcode').style.width).toBe('100mm');
        expect(page.window.localStorage.getItem(STORAGE_KEYS.size)).toBe('100x70');
        expect(page.document.querySelector('[data-size="100x70"]')?.getAttribute('aria-pressed')).toBe('true');
    });

    it('should restore both choices after a reload', () => {
        const first = openPage('?data=ABC123');
        first.click('[data-mode="barcode"]');
        first.click('[data-size="100x70"]');

        const stored = {
            [STORAGE_KEYS.mode]: first.window.localStorage.getItem(STORAGE_KEYS.mode) ?? '',
            [STORAGE_KEYS.size]: first.window.localStorage.getItem(STORAGE_KEYS.size) ?? '',
        };
        const reloaded = openPage('?data=ABC123', { stored });

        expect(reloaded.figure('barcode').hidden).toBe(false);
        expect(reloaded.figure('qr').hidden).toBe(true);
        expect(reloaded.figure('barcode').style.width).toBe('100mm');
        expect(reloaded.document.body.getAttribute('data-size')).toBe('100x70');
    });

    it('should fall back to defaults for unknown stored values', () => {
        const page = openPage('?data=ABC123', {
            stored: { [STORAGE_KEYS.mode]: 'datamatrix', [STORAGE_KEYS.size]: 'A4' },
        });

        expect(page.figure('qr').hidden).toBe(false);
        expect(page.document.body.getAttribute('data-mode')).toBe('qr');
        expect(page.document.body.getAttribute('data-size')).toBe('58x40');
    });

    it('should inject the page size rules before printing', () => {
        const page = openPage('?data=ABC123');
        page.click('[data-size="100x70"]');

        page.click('#print-button');

        expect(page.document.getElementById('print-page-size')?.textContent).toBe(pageSizeCss(LABEL_SIZES[1]));
        expect(page.print).toHaveBeenCalledTimes(1);
    });

    it('should not print while only switching modes', () => {
        const page = openPage('?data=ABC123');

        page.click('[data-mode="barcode"]');

        expect(page.print).not.toHaveBeenCalled();
        expect(page.document.getElementById('print-page-size')?.textContent).toBe('');
    });

    it('should put user text into the page as text, not markup', () => {
        const page = openPage(`?data=${encodeURIComponent('<b>x</b>&1')}`);

        expect(page.figure('qr').querySelector('figcaption')?.textContent).toBe('<b>x</b>&1');
        expect(page.figure('qr').querySelector('b')).toBeNull();
        expect(page.document.title).toBe('Print <b>x</b>&1');
    });

    it('should trim the serial like the bot does', () => {
        const page = openPage('?data=%20%20SN-001%20');

        expect(page.figure('qr').querySelector('figcaption')?.textContent).toBe('SN-001');
    });

    it('should explain a missing serial and disable printing', () => {
        const page = openPage('');
        const status = page.document.getElementById('status');

        expect(status?.hidden).toBe(false);
        expect(status?.textContent).toBe(MISSING_DATA_MESSAGE);
        expect(page.figure('qr').hidden).toBe(true);
        expect(page.figure('barcode').hidden).toBe(true);
        expect(page.figure('qr').querySelector('svg')).toBeNull();

        page.click('#print-button');
        expect(page.print).not.toHaveBeenCalled();
    });

    it('should treat a blank serial as missing', () => {
        const page = openPage('?data=%20%20');

        expect(page.document.getElementById('status')?.textContent).toBe(MISSING_DATA_MESSAGE);
    });

    it('should show the encoding error in place of a symbol that cannot be drawn', () => {
        const page = openPage(`?data=${'x'.repeat(3000)}`);
        const error = page.figure('qr').querySelector('.encode-error');

        expect(page.figure('qr').querySelector('svg')).toBeNull();
        expect(error?.textContent).toMatch(/^Cannot encode serial as qr: /);
        expect(page.figure('qr').querySelector('figcaption')?.textContent).toBe('x'.repeat(3000));
    });

    it('should tell Telegram the web app is ready', () => {
        const page = openPage('?data=ABC123', { telegram: true });

        expect(page.ready).toHaveBeenCalledTimes(1);
        expect(page.expand).toHaveBeenCalledTimes(1);
    });
});

describe('pageSizeCss', () => {
    it('should size the page box to the label', () => {
        expect(pageSizeCss(LABEL_SIZES[0]).split('\n')[0]).toBe('@page { size: 58mm 40mm; margin: 0; }');
        expect(pageSizeCss(LABEL_SIZES[1])).toContain(
            '  .label { width: 100mm; height: 70mm; margin: 0; border: 0; page-break-after: avoid; }'
        );
    });
});
