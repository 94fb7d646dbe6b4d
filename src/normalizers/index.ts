export { apodNormalizer, DEFAULT_ATTRIBUTION, DEFAULT_TITLE } from './apod.normalizer.js';
export * from './types.js';
