/**
 * Sentry Error Tracking Configuration
 *
 * Set the SENTRY_DSN environment variable to enable Sentry.
 * Without a DSN, Sentry stays disabled and errors are only logged.
 */

import * as Sentry from '@sentry/node';
import type { Application } from 'express';
import * as functions from 'firebase-functions';

const SENTRY_DSN = process.env.SENTRY_DSN || '';

let isInitialized = false;

/**
 * Initialize Sentry. Call once, before the Express app is created.
 */
export function initSentry(): void {
    if (isInitialized) {
        return;
    }

    if (!SENTRY_DSN) {
        functions.logger.info('[sentry] SENTRY_DSN not configured. Error tracking disabled.');
        isInitialized = true;
        return;
    }

    Sentry.init({
        dsn: SENTRY_DSN,
        environment: process.env.NODE_ENV || 'development',
        release: process.env.FUNCTIONS_VERSION || 'unknown',
        tracesSampleRate: process.env.NODE_ENV === 'production' ? 0.1 : 1.0,

        // Don't send errors in test environment
        enabled: process.env.NODE_ENV !== 'test',

        beforeSend(event) {
            // Request bodies carry document images and clinical records
            if (event.request?.data) {
                event.request.data = '[REDACTED]';
            }
            return event;
        },

        ignoreErrors: ['ECONNRESET', 'ETIMEDOUT'],
    });

    functions.logger.info('[sentry] Sentry initialized successfully');
    isInitialized = true;
}

/**
 * Capture an exception and send to Sentry.
 * Also logs to the Firebase Functions logger.
 */
export function captureException(
    error: unknown,
    context?: Record<string, unknown>
): string | undefined {
    functions.logger.error('[error]', error);

    if (!SENTRY_DSN) {
        return undefined;
    }

    return Sentry.captureException(error, context ? { extra: context } : undefined);
}

/**
 * Setup Sentry error handling for Express.
 * Call this AFTER all routes but BEFORE the custom error handler.
 */
export function setupSentryErrorHandler(app: Application): void {
    if (!SENTRY_DSN) return;
    Sentry.setupExpressErrorHandler(app);
}
