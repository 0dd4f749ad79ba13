import type { Context } from 'hono';

/**
 * GET /health - Health check endpoint
 *
 * Returns server health status for monitoring and load balancers.
 */
export default function (context: Context) {
    return context.json({
        status: 'healthy',
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
    });
}
