import { RANKS, SUITS, makeCard } from '../../cards/Card.js';
import type { Card } from '../../cards/Card.js';
import { DeckExhaustedError } from '../../util/errors.js';
import { cryptoRNG } from '../../util/rng.js';
import type { RNG } from '../../util/rng.js';

export const DECK_SIZE = SUITS.length * RANKS.length;

export function makeCards(): Card[] {
  const cards: Card[] = [];
  for (const s of SUITS) {
    for (const r of RANKS) {
      cards.push(makeCard(r, s));
    }
  }
  return cards;
}

/**
 * A single 52-card deck dealt from the end. Passing `cards` stacks the deck:
 * the last element is dealt first.
 */
export class Deck {
  private readonly cards: Card[];

  constructor(cards: readonly Card[] = makeCards()) {
    this.cards = cards.slice();
  }

  get remaining(): number {
    return this.cards.length;
  }

  shuffle(rng: RNG = cryptoRNG): void {
    const a = this.cards;
    for (let i = a.length - 1; i > 0; i--) {
      const j = rng(i + 1);
      [a[i], a[j]] = [a[j], a[i]];
    }
  }

  deal(): Card {
    const card = this.cards.pop();
    if (card === undefined) throw new DeckExhaustedError();
    return card;
  }

  toArray(): Card[] {
    return this.cards.slice();
  }
}
