/**
 * Sources Module
 */

export { SourceRegistry, compareSources } from './registry.js';
export { seedSources, loadSourceDefinitions, parseSourceDefinitions } from './seed.js';
