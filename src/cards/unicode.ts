import type { Card, Suit } from './Card.js';

// Unicode Playing Cards block mapping (no Knights)
// Suits base code points (Ace): Spades U+1F0A1, Hearts U+1F0B1, Diamonds U+1F0C1, Clubs U+1F0D1
const SUIT_BASE: Record<Suit, number> = { Spades: 0x1f0a1, Hearts: 0x1f0b1, Diamonds: 0x1f0c1, Clubs: 0x1f0d1 };

export function cardToUnicode(card: Card): string {
  // Knight sits at offset 11, so Queen and King shift up by one.
  const off = card.rank <= 11 ? card.rank - 1 : card.rank;
  return String.fromCodePoint(SUIT_BASE[card.suit] + off);
}
