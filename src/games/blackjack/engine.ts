import { randomUUID } from 'node:crypto';
import log from '../../cli/logger.js';
import { IllegalTransitionError } from '../../util/errors.js';
import { cryptoRNG } from '../../util/rng.js';
import type { RNG } from '../../util/rng.js';
import { Deck } from './deck.js';
import { Hand, isBust } from './hand.js';
import type {
  Decision,
  DecisionSource,
  HandSnapshot,
  Outcome,
  PlayerTurn,
  PresentationSink,
  RoundEvent,
  RoundPhase,
} from './types.js';

const rlog = log.withScope('blackjack');

export const DEALER_STANDS_ON = 17;

const TRANSITIONS: Record<RoundPhase, readonly RoundPhase[]> = {
  setup: ['player_turn'],
  player_turn: ['dealer_turn', 'resolved'],
  dealer_turn: ['resolved'],
  resolved: ['setup'],
};

export function parseDecision(raw: string): Decision | null {
  const v = raw.trim().toLowerCase();
  if (v === 'h' || v === 'hit') return 'hit';
  if (v === 's' || v === 'stand') return 'stand';
  return null;
}

export function dealerShouldHit(total: number): boolean {
  return total < DEALER_STANDS_ON;
}

export function resolveOutcome(playerTotal: number, dealerTotal: number): Outcome {
  if (isBust(playerTotal)) return 'player_bust';
  if (isBust(dealerTotal)) return 'dealer_bust';
  if (playerTotal > dealerTotal) return 'player_win';
  if (dealerTotal > playerTotal) return 'dealer_win';
  return 'tie';
}

export type RoundEngineOptions = {
  sink: PresentationSink;
  decisions: DecisionSource;
  rng?: RNG;
  /** Builds the deck for each round; shuffled with `rng` before the deal. */
  deckFactory?: () => Deck;
};

/**
 * Plays one round at a time: setup, player turn, dealer turn, resolution.
 * Deck and hands are rebuilt at the start of every round.
 */
export class RoundEngine {
  private readonly sink: PresentationSink;
  private readonly decisions: DecisionSource;
  private readonly rng: RNG;
  private readonly deckFactory: () => Deck;

  private deck: Deck;
  private player = new Hand('player');
  private dealer = new Hand('dealer');
  private current: RoundPhase | null = null;
  private id = '';

  constructor(opts: RoundEngineOptions) {
    this.sink = opts.sink;
    this.decisions = opts.decisions;
    this.rng = opts.rng ?? cryptoRNG;
    this.deckFactory = opts.deckFactory ?? (() => new Deck());
    this.deck = this.deckFactory();
  }

  get phase(): RoundPhase | null {
    return this.current;
  }

  get roundId(): string {
    return this.id;
  }

  get cardsRemaining(): number {
    return this.deck.remaining;
  }

  get hands(): { player: HandSnapshot; dealer: HandSnapshot } {
    return { player: this.player.snapshot(), dealer: this.dealer.snapshot() };
  }

  async playRound(): Promise<Outcome> {
    if (this.current === null || this.current === 'resolved') this.id = randomUUID();
    this.enter('setup');
    try {
      this.setup();
      const result = await this.playerTurn();
      if (result === 'stand') this.dealerTurn();
      return this.resolve();
    } catch (err) {
      rlog.debug('round aborted', { roundId: this.id, phase: this.current });
      this.current = null;
      throw err;
    }
  }

  private setup(): void {
    this.deck = this.deckFactory();
    this.deck.shuffle(this.rng);
    this.player = new Hand('player');
    this.dealer = new Hand('dealer');
    for (let i = 0; i < 2; i++) {
      this.dealTo(this.dealer);
      this.dealTo(this.player);
    }
    this.enter('player_turn');
  }

  private async playerTurn(): Promise<'stand' | 'bust'> {
    for (;;) {
      const turn: PlayerTurn = { player: this.player.snapshot(), dealerUpCard: this.dealer.cards[0] };
      this.emit({ type: 'turn', ...turn });
      const raw = await this.decisions.decide(turn);
      const decision = parseDecision(raw);
      if (decision === null) {
        this.emit({ type: 'invalid_decision', input: raw });
        continue;
      }
      if (decision === 'stand') return 'stand';
      this.dealTo(this.player);
      if (this.player.isBust()) return 'bust';
    }
  }

  private dealerTurn(): void {
    this.enter('dealer_turn');
    while (dealerShouldHit(this.dealer.total())) {
      this.dealTo(this.dealer);
    }
  }

  private resolve(): Outcome {
    this.enter('resolved');
    const player = this.player.snapshot();
    const dealer = this.dealer.snapshot();
    const outcome = resolveOutcome(player.total, dealer.total);
    this.emit({ type: 'resolved', outcome, player, dealer });
    rlog.info('round resolved', { roundId: this.id, outcome, player: player.total, dealer: dealer.total });
    return outcome;
  }

  private dealTo(hand: Hand): void {
    const card = this.deck.deal();
    hand.add(card);
    this.emit({ type: 'deal', party: hand.owner, card, hand: hand.snapshot(), phase: this.current ?? 'setup' });
  }

  private enter(next: RoundPhase): void {
    const from = this.current;
    const allowed = from === null ? next === 'setup' : TRANSITIONS[from].includes(next);
    if (!allowed) throw new IllegalTransitionError(from ?? 'idle', next);
    this.current = next;
    rlog.debug('phase', { roundId: this.id, from, to: next });
    this.emit({ type: 'phase', phase: next });
  }

  private emit(event: RoundEvent): void {
    this.sink.onEvent(event);
  }
}
