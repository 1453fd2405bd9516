/**
 * Drift Detection Module
 *
 * Fingerprints published files so re-publishing can tell
 * created, unchanged and changed files apart.
 *
 * @module services/drift
 */

export * from './change-detector.js';
