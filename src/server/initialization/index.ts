/**
 * Server initialization module exports
 */

export { getServerCapabilities } from './capabilities';
