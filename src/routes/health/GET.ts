import type { Context } from 'hono';
import { createSuccessResponse } from '@src/lib/api-helpers.js';

/**
 * GET /health - Health check endpoint
 *
 * Returns server health status for monitoring and load balancers.
 * Public endpoint, no authentication required.
 */
export default function (context: Context) {
    return createSuccessResponse(context, {
        status: 'healthy',
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
    });
}
