import type { Outcome } from '../../games/blackjack/types.js';
import { DeckExhaustedError, InputClosedError } from '../../util/errors.js';
import { runSession, summaryLine, summaryRows } from '../session.js';
import type { PlayAgainPrompt, RoundRunner } from '../session.js';

function rounds(...results: Array<Outcome | Error>): RoundRunner {
  return {
    playRound: async () => {
      const next = results.shift();
      if (next === undefined) throw new Error('no more rounds');
      if (next instanceof Error) throw next;
      return next;
    },
  };
}

function answers(...replies: Array<boolean | Error>): PlayAgainPrompt {
  return {
    playAgain: async () => {
      const next = replies.shift();
      if (next === undefined) throw new Error('no more answers');
      if (next instanceof Error) throw next;
      return next;
    },
  };
}

function clock(...times: number[]): () => number {
  return () => times.shift() ?? 0;
}

describe('session', () => {
  test('plays until the player declines', async () => {
    const summary = await runSession({
      engine: rounds('player_win', 'tie', 'player_win'),
      prompt: answers(true, true, false),
      now: clock(1_000, 66_000),
    });
    expect(summary.rounds).toBe(3);
    expect(summary.tally).toEqual({ player_win: 2, dealer_bust: 0, dealer_win: 0, player_bust: 0, tie: 1 });
    expect(summary.elapsedMs).toBe(65_000);
    expect(summaryLine(summary)).toBe('Played 3 rounds in 1m 5s.');
  });

  test('closed input while asking to play again keeps the finished round', async () => {
    const summary = await runSession({
      engine: rounds('dealer_bust'),
      prompt: answers(new InputClosedError()),
      now: clock(0, 0),
    });
    expect(summary.rounds).toBe(1);
    expect(summary.tally.dealer_bust).toBe(1);
    expect(summaryLine(summary)).toBe('Played 1 round in 0ms.');
  });

  test('closed input mid-round drops that round', async () => {
    const summary = await runSession({
      engine: rounds('dealer_win', new InputClosedError()),
      prompt: answers(true),
    });
    expect(summary.rounds).toBe(1);
    expect(summary.tally.dealer_win).toBe(1);
  });

  test('protocol violations propagate', async () => {
    await expect(runSession({ engine: rounds(new DeckExhaustedError()), prompt: answers() })).rejects.toBeInstanceOf(
      DeckExhaustedError,
    );
  });

  test('summary rows list every outcome', () => {
    const rows = summaryRows({
      rounds: 2,
      tally: { player_win: 1, dealer_bust: 0, dealer_win: 0, player_bust: 1, tie: 0 },
      elapsedMs: 0,
    });
    expect(rows).toEqual([
      { Result: 'Player wins', Rounds: 1 },
      { Result: 'Dealer busts', Rounds: 0 },
      { Result: 'Dealer wins', Rounds: 0 },
      { Result: 'Player busts', Rounds: 1 },
      { Result: 'Ties', Rounds: 0 },
    ]);
  });
});
