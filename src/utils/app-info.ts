/**
 * Application identity used by the logger and outbound HTTP clients.
 *
 * @module utils/app-info
 */

export const APP_NAME = 'scan-relay';

/** Set by npm when launched through a package script */
export const APP_VERSION = process.env.npm_package_version || '1.0.0';
