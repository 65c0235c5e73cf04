import type { NegotiationRole, PriceDirection } from './types.js';

export function priceDirection(role: NegotiationRole): PriceDirection {
  return role === 'SELLER' ? 'MAXIMIZE' : 'MINIMIZE';
}

export function counterpartRole(role: NegotiationRole): NegotiationRole {
  return role === 'SELLER' ? 'BUYER' : 'SELLER';
}
