/**
 * Central export for storage
 */

export * from './report-store';
