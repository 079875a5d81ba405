export * from './locators.js';
export * from './metadata.js';
export * from './preprocess.js';
export { findArticleNode, readJsonLdText, type JsonLdNode } from './jsonld.js';
