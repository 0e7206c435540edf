/**
 * Browser entry point of the print page bundle
 */

import { mountPrintPage } from '@src/lib/print-page/client.js';

mountPrintPage(window);
