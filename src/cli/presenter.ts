import type { Card } from '../cards/Card.js';
import { renderHand } from '../cards/views.js';
import type { CardView } from '../cards/views.js';
import type { HandSnapshot, Outcome, PresentationSink, RoundEvent } from '../games/blackjack/types.js';
import { getPalette } from './theme.js';
import type { Palette } from './theme.js';

export interface Output {
  write(chunk: string): unknown;
}

export const OUTCOME_TEXT: Record<Outcome, string> = {
  player_bust: 'Player busts! Dealer wins.',
  dealer_bust: 'Dealer busts! Player wins.',
  player_win: 'Player wins!',
  dealer_win: 'Dealer wins!',
  tie: "It's a tie!",
};

export type TerminalPresenterOptions = {
  view: CardView;
  out?: Output;
  palette?: Palette;
};

/** Writes round events to a terminal as plain lines. */
export class TerminalPresenter implements PresentationSink {
  private readonly view: CardView;
  private readonly out: Output;
  private readonly palette: Palette;
  private upCardShown = false;

  constructor(opts: TerminalPresenterOptions) {
    this.view = opts.view;
    this.out = opts.out ?? process.stdout;
    this.palette = opts.palette ?? getPalette();
  }

  onEvent(event: RoundEvent): void {
    switch (event.type) {
      case 'phase':
        if (event.phase === 'setup') {
          this.upCardShown = false;
          this.line(this.palette.bold('--- New round ---'));
        } else if (event.phase === 'dealer_turn') {
          this.line(this.palette.dim("Dealer's turn."));
        }
        return;
      case 'deal':
        if (event.party === 'dealer' && event.phase === 'dealer_turn') {
          this.line(`Dealer draws ${this.view.draw(event.card)} (total ${event.hand.total}).`);
        } else if (event.party === 'player' && event.phase === 'player_turn') {
          this.line(`You draw ${this.view.draw(event.card)}.`);
        }
        return;
      case 'turn':
        if (!this.upCardShown) {
          this.upCardShown = true;
          this.line(`Dealer shows: ${this.card(event.dealerUpCard)}`);
        }
        this.hand('Player', event.player);
        return;
      case 'invalid_decision':
        this.line(this.palette.warn("Invalid choice, please enter 'h' or 's'."));
        return;
      case 'resolved':
        this.hand('Dealer', event.dealer);
        this.hand('Player', event.player);
        this.line(this.outcomeStyle(event.outcome)(OUTCOME_TEXT[event.outcome]));
        return;
    }
  }

  private outcomeStyle(outcome: Outcome): (s: string) => string {
    if (outcome === 'tie') return this.palette.info;
    return outcome === 'player_win' || outcome === 'dealer_bust' ? this.palette.success : this.palette.error;
  }

  private card(card: Card): string {
    return this.view.draw(card);
  }

  private hand(who: 'Player' | 'Dealer', hand: HandSnapshot): void {
    this.line(`${who}'s hand total: ${hand.total}`);
    this.line(`Hand: ${renderHand(hand.cards, this.view)}`);
  }

  private line(text: string): void {
    this.out.write(`${text}\n`);
  }
}
