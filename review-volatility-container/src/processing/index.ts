/**
 * Central export for all processing modules
 */

export * from './dates';
export * from './normalizer';
export * from './pain-matcher';
export * from './review-filter';
export * from './taxonomy';
export * from './whale-classifier';
