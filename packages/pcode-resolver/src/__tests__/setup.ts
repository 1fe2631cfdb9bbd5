/**
 * Global Test Setup
 *
 * Keeps engine logging quiet unless a test asks for it.
 */

process.env.LOG_LEVEL ??= 'error';
