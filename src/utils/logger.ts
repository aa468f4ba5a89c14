/**
 * @fileoverview Console-backed logger.
 * Everything goes to stderr so stdout stays free for the MCP transport.
 *
 * @module utils/logger
 */

import type { Logger } from '../types/base.js';

/**
 * Logs warnings with console.warn and, when `TAGNOTES_DEBUG` is set, debug
 * messages with console.error.
 */
export const consoleLogger: Logger = {
    warn(message: string): void {
        console.warn(message);
    },
    debug(message: string): void {
        if (process.env['TAGNOTES_DEBUG']) {
            console.error(message);
        }
    },
};
