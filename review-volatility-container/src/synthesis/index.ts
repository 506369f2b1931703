/**
 * Central export for all synthesis modules
 */

export * from './narrative-generator';
export * from './report-renderer';
