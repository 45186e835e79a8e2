import prettyMs from 'pretty-ms';
import type { Outcome } from '../games/blackjack/types.js';
import { InputClosedError } from '../util/errors.js';
import log from './logger.js';

const slog = log.withScope('session');

export interface RoundRunner {
  playRound(): Promise<Outcome>;
}

export interface PlayAgainPrompt {
  playAgain(): Promise<boolean>;
}

export type SessionSummary = {
  rounds: number;
  tally: Record<Outcome, number>;
  elapsedMs: number;
};

const OUTCOME_LABELS: Record<Outcome, string> = {
  player_win: 'Player wins',
  dealer_bust: 'Dealer busts',
  dealer_win: 'Dealer wins',
  player_bust: 'Player busts',
  tie: 'Ties',
};

const OUTCOME_ORDER: readonly Outcome[] = ['player_win', 'dealer_bust', 'dealer_win', 'player_bust', 'tie'];

function emptyTally(): Record<Outcome, number> {
  return { player_win: 0, dealer_bust: 0, dealer_win: 0, player_bust: 0, tie: 0 };
}

/**
 * Plays rounds until the player declines another one or the input ends.
 * The tally lives here; the engine starts every round from scratch.
 */
export async function runSession(opts: {
  engine: RoundRunner;
  prompt: PlayAgainPrompt;
  now?: () => number;
}): Promise<SessionSummary> {
  const now = opts.now ?? Date.now;
  const started = now();
  const tally = emptyTally();
  let rounds = 0;
  try {
    for (;;) {
      const outcome = await opts.engine.playRound();
      rounds++;
      tally[outcome]++;
      if (!(await opts.prompt.playAgain())) break;
    }
  } catch (err) {
    if (!(err instanceof InputClosedError)) throw err;
    slog.debug('input closed', { rounds });
  }
  slog.info('session finished', { rounds, tally });
  return { rounds, tally, elapsedMs: now() - started };
}

export function summaryRows(summary: SessionSummary): Array<Record<string, string | number>> {
  return OUTCOME_ORDER.map((o) => ({ Result: OUTCOME_LABELS[o], Rounds: summary.tally[o] }));
}

export function summaryLine(summary: SessionSummary): string {
  const noun = summary.rounds === 1 ? 'round' : 'rounds';
  return `Played ${summary.rounds} ${noun} in ${prettyMs(summary.elapsedMs)}.`;
}
