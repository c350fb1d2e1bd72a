export * from './base-extractor.js';
export * from './extractor-registry.js';
export * from './macro-environment.js';
export * from './pipeline-script-extractor.js';
export * from './sas-program-extractor.js';
export * from './text-scrubbing.js';
export * from './view-definition-extractor.js';
