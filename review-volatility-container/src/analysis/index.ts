/**
 * Central export for the analysis engine
 */

export * from './cluster-extractor';
export * from './engine';
export * from './flatten';
export * from './migration-mapper';
export * from './niche-matrix';
export * from './revenue-estimator';
export * from './risk-scorer';
export * from './signals';
export * from './timeline-detector';
export * from './volatility-engine';
