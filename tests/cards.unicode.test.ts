import { makeCard } from '../src/cards/Card.js';
import { cardToUnicode } from '../src/cards/unicode.js';

describe('unicode playing cards', () => {
  test('specific glyphs', () => {
    expect(cardToUnicode(makeCard(1, 'Spades'))).toBe(String.fromCodePoint(0x1f0a1));
    expect(cardToUnicode(makeCard(11, 'Spades'))).toBe(String.fromCodePoint(0x1f0ab));
    expect(cardToUnicode(makeCard(12, 'Hearts'))).toBe(String.fromCodePoint(0x1f0bd));
    expect(cardToUnicode(makeCard(5, 'Diamonds'))).toBe(String.fromCodePoint(0x1f0c5));
    expect(cardToUnicode(makeCard(13, 'Clubs'))).toBe(String.fromCodePoint(0x1f0de));
  });
});
