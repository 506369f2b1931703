export * from './review';
export * from './analysis';
export * from './narrative';
