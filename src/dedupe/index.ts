/**
 * Deduplication Module Exports
 *
 * @module dedupe
 */

export { dedupeNew, existingIdentitiesFromColumn } from './identity.js';
