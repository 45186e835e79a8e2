import type { Card } from '../../cards/Card.js';

export type Party = 'player' | 'dealer';
export type Decision = 'hit' | 'stand';
export type Outcome = 'player_bust' | 'dealer_bust' | 'player_win' | 'dealer_win' | 'tie';
export type RoundPhase = 'setup' | 'player_turn' | 'dealer_turn' | 'resolved';

export interface HandSnapshot {
  cards: readonly Card[];
  total: number;
}

export type RoundEvent =
  | { type: 'phase'; phase: RoundPhase }
  | { type: 'deal'; party: Party; card: Card; hand: HandSnapshot; phase: RoundPhase }
  | { type: 'turn'; player: HandSnapshot; dealerUpCard: Card }
  | { type: 'invalid_decision'; input: string }
  | { type: 'resolved'; outcome: Outcome; player: HandSnapshot; dealer: HandSnapshot };

export interface PresentationSink {
  onEvent(event: RoundEvent): void;
}

export interface PlayerTurn {
  player: HandSnapshot;
  dealerUpCard: Card;
}

/** Raw input is returned as-is; the engine decides whether it is a valid decision. */
export interface DecisionSource {
  decide(turn: PlayerTurn): string | Promise<string>;
}
