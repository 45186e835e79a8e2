import { ACE } from '../../cards/Card.js';
import type { Card, Rank } from '../../cards/Card.js';
import type { HandSnapshot, Party } from './types.js';

export const BUST_LIMIT = 21;

export function valueOfCard(r: Rank): number {
  if (r === ACE) return 11; // can be 1 later
  if (r >= 10) return 10;
  return r;
}

export function handValue(cards: readonly Card[]): { total: number; soft: boolean } {
  let total = 0;
  let aces = 0;
  for (const c of cards) {
    total += valueOfCard(c.rank);
    if (c.rank === ACE) aces++;
  }
  while (total > BUST_LIMIT && aces > 0) {
    total -= 10; // count one Ace as 1 instead of 11
    aces--;
  }
  return { total, soft: aces > 0 };
}

export function handTotal(cards: readonly Card[]): number {
  return handValue(cards).total;
}

export function isBust(total: number): boolean {
  return total > BUST_LIMIT;
}

export class Hand {
  private readonly held: Card[] = [];

  constructor(readonly owner: Party) {}

  add(card: Card): void {
    this.held.push(card);
  }

  get cards(): readonly Card[] {
    return this.held;
  }

  get size(): number {
    return this.held.length;
  }

  total(): number {
    return handTotal(this.held);
  }

  isBust(): boolean {
    return isBust(this.total());
  }

  snapshot(): HandSnapshot {
    return { cards: this.held.slice(), total: this.total() };
  }
}
