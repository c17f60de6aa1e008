/**
 * Routes Index
 * 
 * Barrel export for all API routes.
 */

export { healthRoutes } from './health.js';
export { audioRoutes } from './audio.js';
export { probeRoutes } from './probe.js';
export { downloadRoutes } from './download.js';
