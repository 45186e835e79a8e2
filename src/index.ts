#!/usr/bin/env node
// Loads .env before the modules below read the environment
import 'dotenv/config';
import { getCardView } from './cards/views.js';
import { loadConfig } from './config/index.js';
import { RoundEngine } from './games/blackjack/engine.js';
import { TerminalPresenter } from './cli/presenter.js';
import { TerminalPrompt } from './cli/prompt.js';
import { runSession, summaryLine, summaryRows } from './cli/session.js';
import { ui } from './cli/ui.js';
import log from './cli/logger.js';
import { errorMessage } from './util/errors.js';
import { rngFor } from './util/rng.js';

async function main() {
  const cfg = loadConfig();
  log.setLevel(cfg.logLevel);
  if (cfg.banner) ui.banner();
  log.debug('config loaded', 'boot', { cardStyle: cfg.cardStyle, seeded: cfg.seed !== undefined });

  const prompt = new TerminalPrompt();
  const engine = new RoundEngine({
    sink: new TerminalPresenter({ view: getCardView(cfg.cardStyle) }),
    decisions: prompt,
    rng: rngFor(cfg.seed),
  });

  try {
    const summary = await runSession({ engine, prompt });
    ui.say(summaryLine(summary), 'title');
    ui.table(summaryRows(summary));
  } finally {
    prompt.close();
  }
}

main().catch((err: unknown) => {
  log.error(errorMessage(err), 'boot', { name: err instanceof Error ? err.name : typeof err });
  process.exitCode = 1;
});
