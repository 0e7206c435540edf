/**
 * Print page client
 *
 * Runs in the browser (bundled by bundle.ts). Reads the serial from the
 * `data` query parameter, draws both symbols into the static page, and
 * switches code type and label size without a reload. Both choices are kept
 * in localStorage; the @page rules are injected right before window.print().
 */

import { barcodeSvg } from '@src/lib/encoder/barcode.js';
import { qrSvg } from '@src/lib/encoder/qr.js';
import { normalizeSerial, type CodeKind } from '@src/lib/encoder/serial.js';
import {
    DEFAULT_MODE,
    DEFAULT_SIZE,
    LABEL_SIZES,
    MODES,
    STORAGE_KEYS,
    pageSizeCss,
    type LabelSize,
} from '@src/lib/print-page/preferences.js';

interface TelegramWebApp {
    ready(): void;
    expand(): void;
}

declare global {
    interface Window {
        Telegram?: { WebApp?: TelegramWebApp };
    }
}

const SYMBOLS: Record<CodeKind, (serial: string) => string> = {
    qr: qrSvg,
    barcode: barcodeSvg,
};

export const MISSING_DATA_MESSAGE = 'No serial number in the link. Open this page from the bot.';

interface PageState {
    mode: CodeKind;
    size: LabelSize;
}

function readPreference(win: Window, key: string): string | null {
    try {
        return win.localStorage.getItem(key);
    } catch (error) {
        console.warn('localStorage unavailable', error);
        return null;
    }
}

function writePreference(win: Window, key: string, value: string): void {
    try {
        win.localStorage.setItem(key, value);
    } catch (error) {
        console.warn('localStorage unavailable', error);
    }
}

function sizeById(id: string | null): LabelSize | undefined {
    return LABEL_SIZES.find((size) => size.id === id);
}

function modeById(id: string | null): CodeKind | undefined {
    return MODES.find((mode) => mode.id === id)?.id;
}

function restoreState(win: Window): PageState {
    return {
        mode: modeById(readPreference(win, STORAGE_KEYS.mode)) ?? DEFAULT_MODE,
        size: sizeById(readPreference(win, STORAGE_KEYS.size)) ?? sizeById(DEFAULT_SIZE) ?? LABEL_SIZES[0],
    };
}

function toggleButton(doc: Document, attribute: 'data-mode' | 'data-size', value: string, label: string) {
    const button = doc.createElement('button');
    button.type = 'button';
    button.setAttribute(attribute, value);
    button.setAttribute('aria-pressed', 'false');
    button.textContent = label;
    return button;
}

function showStatus(doc: Document, message: string): void {
    const status = doc.getElementById('status');
    if (status) {
        status.textContent = message;
        status.hidden = false;
    }
}

/**
 * Draw one symbol into its figure. An encoding error replaces the symbol
 * with the error message; the other symbol is unaffected.
 */
function drawSymbol(figure: HTMLElement, kind: CodeKind, serial: string): void {
    const doc = figure.ownerDocument;
    try {
        figure.insertAdjacentHTML('afterbegin', SYMBOLS[kind](serial));
    } catch (error) {
        const message = doc.createElement('p');
        message.className = 'encode-error';
        message.textContent = error instanceof Error ? error.message : String(error);
        figure.prepend(message);
    }
    const caption = figure.querySelector('figcaption');
    if (caption) {
        caption.textContent = serial;
    }
}

export function mountPrintPage(win: Window): void {
    const doc = win.document;
    const state = restoreState(win);

    doc.getElementById('mode-buttons')?.append(
        ...MODES.map((mode) => toggleButton(doc, 'data-mode', mode.id, mode.label))
    );
    doc.getElementById('size-buttons')?.append(
        ...LABEL_SIZES.map((size) => toggleButton(doc, 'data-size', size.id, size.label))
    );

    const figures = Array.from(doc.querySelectorAll<HTMLElement>('figure.label'));
    const raw = new URLSearchParams(win.location.search).get('data') ?? '';
    let serial: string | undefined;
    try {
        serial = normalizeSerial(raw);
    } catch {
        showStatus(doc, MISSING_DATA_MESSAGE);
    }

    if (serial !== undefined) {
        doc.title = `Print ${serial}`;
        doc.body.setAttribute('data-serial', serial);
        for (const figure of figures) {
            const kind = modeById(figure.getAttribute('data-code'));
            if (kind) {
                drawSymbol(figure, kind, serial);
            }
        }
    }

    const printButton = doc.getElementById('print-button');
    if (printButton instanceof HTMLButtonElement) {
        printButton.disabled = serial === undefined;
    }

    const apply = () => {
        for (const figure of figures) {
            figure.hidden = serial === undefined || figure.getAttribute('data-code') !== state.mode;
            figure.style.width = state.size.width;
            figure.style.height = state.size.height;
        }
        for (const button of Array.from(doc.querySelectorAll('[data-mode], [data-size]'))) {
            const pressed = button.hasAttribute('data-mode')
                ? button.getAttribute('data-mode') === state.mode
                : button.getAttribute('data-size') === state.size.id;
            button.setAttribute('aria-pressed', pressed ? 'true' : 'false');
        }
        doc.body.setAttribute('data-mode', state.mode);
        doc.body.setAttribute('data-size', state.size.id);
    };

    doc.addEventListener('click', (event) => {
        const target = event.target instanceof Element ? event.target.closest('button') : null;
        if (!target) {
            return;
        }

        const mode = modeById(target.getAttribute('data-mode'));
        const size = sizeById(target.getAttribute('data-size'));
        if (mode) {
            state.mode = mode;
            writePreference(win, STORAGE_KEYS.mode, mode);
            apply();
        } else if (size) {
            state.size = size;
            writePreference(win, STORAGE_KEYS.size, size.id);
            apply();
        } else if (target.id === 'print-button' && serial !== undefined) {
            const pageStyle = doc.getElementById('print-page-size');
            if (pageStyle) {
                pageStyle.textContent = pageSizeCss(state.size);
            }
            win.print();
        }
    });

    const webApp = win.Telegram?.WebApp;
    if (webApp) {
        webApp.ready();
        webApp.expand();
    }

    apply();
}
