/**
 * Module Loader
 *
 * Imports compiled definitions modules and catalogs their exported classes.
 *
 * @module services/loader
 */

export * from './module-loader.js';
