import { makeCard } from '../../cards/Card.js';
import type { Rank } from '../../cards/Card.js';
import { symbolView, wordView } from '../../cards/views.js';
import { Deck } from '../../games/blackjack/deck.js';
import { RoundEngine } from '../../games/blackjack/engine.js';
import type { DecisionSource } from '../../games/blackjack/types.js';
import type { RNG } from '../../util/rng.js';
import { TerminalPresenter } from '../presenter.js';
import type { Output } from '../presenter.js';
import { getPalette } from '../theme.js';

const identity: RNG = (maxExclusive) => maxExclusive - 1;

class Lines implements Output {
  text = '';
  write(chunk: string): boolean {
    this.text += chunk;
    return true;
  }
  get lines(): string[] {
    return this.text.split('\n').filter((l) => l.length > 0);
  }
}

function scripted(...inputs: string[]): DecisionSource {
  return {
    decide: () => {
      const next = inputs.shift();
      if (next === undefined) throw new Error('out of scripted decisions');
      return next;
    },
  };
}

async function play(order: Rank[], decisions: DecisionSource, view = symbolView): Promise<string[]> {
  const out = new Lines();
  const presenter = new TerminalPresenter({ view, out, palette: getPalette({ color: false }) });
  const engine = new RoundEngine({
    sink: presenter,
    decisions,
    rng: identity,
    deckFactory: () => new Deck(order.map((r) => makeCard(r, 'Spades')).reverse()),
  });
  await engine.playRound();
  return out.lines;
}

describe('terminal presenter', () => {
  test('prints a round the dealer wins by drawing', async () => {
    expect(await play([6, 10, 5, 7, 10], scripted('s'))).toEqual([
      '--- New round ---',
      'Dealer shows: 6♠',
      "Player's hand total: 17",
      'Hand: 10♠, 7♠',
      "Dealer's turn.",
      'Dealer draws 10♠ (total 21).',
      "Dealer's hand total: 21",
      'Hand: 6♠, 5♠, 10♠',
      "Player's hand total: 17",
      'Hand: 10♠, 7♠',
      'Dealer wins!',
    ]);
  });

  test('prints hits, invalid input and a bust', async () => {
    expect(await play([6, 10, 5, 9, 5], scripted('q', 'h'), wordView)).toEqual([
      '--- New round ---',
      'Dealer shows: 6 of Spades',
      "Player's hand total: 19",
      'Hand: 10 of Spades, 9 of Spades',
      "Invalid choice, please enter 'h' or 's'.",
      "Player's hand total: 19",
      'Hand: 10 of Spades, 9 of Spades',
      'You draw 5 of Spades.',
      "Dealer's hand total: 11",
      'Hand: 6 of Spades, 5 of Spades',
      "Player's hand total: 24",
      'Hand: 10 of Spades, 9 of Spades, 5 of Spades',
      'Player busts! Dealer wins.',
    ]);
  });

  test('ties', async () => {
    const lines = await play([10, 10, 9, 9], scripted('stand'));
    expect(lines[lines.length - 1]).toBe("It's a tie!");
  });
});
