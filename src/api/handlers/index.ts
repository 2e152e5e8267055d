/**
 * Handler exports for the API layer.
 */

export * from './BrokerHandlers.js';
