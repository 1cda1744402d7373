/**
 * Bazaar Node
 *
 * Library entry point. A host wires a MarketplaceNode to its broadcast and
 * payment network clients and drives it through Participant actions.
 */

export * from './errors';
export * from './config';
export * from './crypto';
export * from './events';
export * from './anti-spam';
export * from './event-store';
export * from './storage';
export * from './escrow';
export * from './market';
export * from './reputation';
export * from './network';
export * from './payments';
export * from './scaling';
export * from './node';
