export * from './corpus-repository.js';
