export type Suit = 'Hearts' | 'Diamonds' | 'Spades' | 'Clubs';
export type Rank = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12 | 13;
export type Card = { readonly rank: Rank; readonly suit: Suit };

export const SUITS: readonly Suit[] = ['Hearts', 'Diamonds', 'Spades', 'Clubs'];
export const RANKS: readonly Rank[] = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13];

export const ACE: Rank = 1;

export function makeCard(rank: Rank, suit: Suit): Card {
  return Object.freeze({ rank, suit });
}
