import { InlineKeyboard } from 'grammy';

export const CALLBACK_SEND = 'labels:send';
export const CALLBACK_PRINT = 'labels:print';

/**
 * Buttons under the echoed serial. "Print" only appears when a print page is configured.
 */
export function labelKeyboard(printPageUrl?: string): InlineKeyboard {
    const keyboard = new InlineKeyboard().text('Send to chat', CALLBACK_SEND);
    if (printPageUrl) {
        keyboard.text('Print', CALLBACK_PRINT);
    }
    return keyboard;
}

/**
 * Print page address for a serial: <base>?data=<serial>
 */
export function printPageLink(baseUrl: string, serial: string): string {
    const url = new URL(baseUrl);
    url.searchParams.set('data', serial);
    return url.toString();
}

export function printKeyboard(link: string): InlineKeyboard {
    return new InlineKeyboard().webApp('Open for printing', link);
}
