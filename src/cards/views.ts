import type { Card, Rank, Suit } from './Card.js';
import { cardToUnicode } from './unicode.js';

export type CardStyle = 'word' | 'symbol' | 'unicode';

export const CARD_STYLES: readonly CardStyle[] = ['word', 'symbol', 'unicode'];

/** Renders a single card as text. Picked once at startup, never per call. */
export interface CardView {
  readonly style: CardStyle;
  draw(card: Card): string;
}

const RANK_WORDS: Partial<Record<Rank, string>> = { 1: 'Ace', 11: 'Jack', 12: 'Queen', 13: 'King' };
const RANK_LETTERS: Partial<Record<Rank, string>> = { 1: 'A', 11: 'J', 12: 'Q', 13: 'K' };
const SUIT_GLYPHS: Record<Suit, string> = { Hearts: '♥', Diamonds: '♦', Spades: '♠', Clubs: '♣' };

export const wordView: CardView = {
  style: 'word',
  draw: (card) => `${RANK_WORDS[card.rank] ?? String(card.rank)} of ${card.suit}`,
};

export const symbolView: CardView = {
  style: 'symbol',
  draw: (card) => `${RANK_LETTERS[card.rank] ?? String(card.rank)}${SUIT_GLYPHS[card.suit]}`,
};

export const unicodeView: CardView = {
  style: 'unicode',
  draw: cardToUnicode,
};

const VIEWS: Record<CardStyle, CardView> = { word: wordView, symbol: symbolView, unicode: unicodeView };

export function getCardView(style: CardStyle): CardView {
  return VIEWS[style];
}

export function renderHand(cards: readonly Card[], view: CardView): string {
  return cards.map((c) => view.draw(c)).join(', ');
}
