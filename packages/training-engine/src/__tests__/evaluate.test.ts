import { describe, it, expect } from 'vitest';
import {
  BarrelTurnType,
  BoardTexture,
  DrawType,
  HandCategory,
  HandStrength,
  TurnCardType,
  boardTexture,
  classifyBarrelTurn,
  classifyDraw,
  classifyHand,
  classifyTurnCard,
  classifyTurnStrength,
  drawEquity,
  heroHasFlushDraw,
  heroHasStraightDraw,
  requiredEquity,
} from '../evaluate.js';
import { board, c, hole } from './fixtures.js';

describe('classifyHand', () => {
  it.each([
    ['As', 'Ad', HandCategory.Premium],
    ['Ks', 'Kh', HandCategory.Premium],
    ['Qc', 'Qd', HandCategory.Premium],
    ['Js', 'Jh', HandCategory.Strong],
    ['Ts', 'Th', HandCategory.Strong],
    ['8s', '8d', HandCategory.Playable],
    ['7s', '7d', HandCategory.Playable],
    ['3s', '3d', HandCategory.Marginal],
    ['As', 'Ks', HandCategory.Premium],
    ['Ah', 'Kd', HandCategory.Strong],
    ['Ah', 'Qd', HandCategory.Strong],
    ['Ah', '9h', HandCategory.Playable],
    ['Ah', '9d', HandCategory.Marginal],
    ['Kh', 'Qh', HandCategory.Playable],
    ['Kh', 'Qd', HandCategory.Marginal],
    ['9c', '8c', HandCategory.Playable],
    ['8c', '7c', HandCategory.Trash],
    ['7s', '2d', HandCategory.Trash],
    ['8h', '3c', HandCategory.Trash],
    ['Th', '2c', HandCategory.Marginal],
  ])('%s%s is %s', (a, b, expected) => {
    expect(classifyHand(hole(a, b))).toBe(expected);
  });

  it('does not depend on card order', () => {
    expect(classifyHand(hole('Kd', 'Ah'))).toBe(classifyHand(hole('Ah', 'Kd')));
  });
});

describe('boardTexture', () => {
  it('treats an empty board as dry', () => {
    expect(boardTexture([])).toBe(BoardTexture.Dry);
  });

  it('is dry with no suit pair and no connected ranks', () => {
    expect(boardTexture(board('Ks 7d 2c'))).toBe(BoardTexture.Dry);
  });

  it('is semi-wet with only a flush draw', () => {
    expect(boardTexture(board('Kh 7h 2c'))).toBe(BoardTexture.SemiWet);
  });

  it('is semi-wet with only a straight draw', () => {
    expect(boardTexture(board('As Kd 7c'))).toBe(BoardTexture.SemiWet);
  });

  it('is wet with both', () => {
    expect(boardTexture(board('9h 8h 2c'))).toBe(BoardTexture.Wet);
  });

  it('counts a three-rank window spanning four as a straight draw', () => {
    expect(boardTexture(board('9s 7d 5c'))).toBe(BoardTexture.SemiWet);
  });
});

describe('classifyDraw', () => {
  it('maps board signals onto draw buckets', () => {
    expect(classifyDraw(board('9h 8h 2c'))).toBe(DrawType.ComboDraw);
    expect(classifyDraw(board('Kh 7h 2c'))).toBe(DrawType.FlushDraw);
    expect(classifyDraw(board('9s 8d 2c'))).toBe(DrawType.OESD);
    expect(classifyDraw(board('Ks 7d 2c'))).toBe(DrawType.GutShot);
  });
});

describe('equity', () => {
  it('returns the fixed equity per draw and street count', () => {
    expect(drawEquity(DrawType.FlushDraw, 2)).toBe(0.35);
    expect(drawEquity(DrawType.OESD, 2)).toBe(0.32);
    expect(drawEquity(DrawType.ComboDraw, 1)).toBe(0.3);
    expect(drawEquity(DrawType.GutShot, 1)).toBe(0.09);
  });

  it('computes call / (pot + call)', () => {
    expect(requiredEquity(50, 100)).toBeCloseTo(1 / 3);
    expect(requiredEquity(10, 30)).toBe(0.25);
  });

  it('is zero when nothing is at stake', () => {
    expect(requiredEquity(0, 0)).toBe(0);
  });
});

describe('hero draws', () => {
  it('sees a flush draw when a hole card suit is already paired on board', () => {
    expect(heroHasFlushDraw(hole('Ah', '2s'), board('Kh 7h 2c'))).toBe(true);
    expect(heroHasFlushDraw(hole('As', '3d'), board('Kh 7h 2c'))).toBe(false);
  });

  it('needs a connected board and a nearby hole card for a straight draw', () => {
    expect(heroHasStraightDraw(hole('Ts', '3h'), board('9s 8d 2c'))).toBe(true);
    expect(heroHasStraightDraw(hole('As', 'Ah'), board('6s 5d 2c'))).toBe(false);
    expect(heroHasStraightDraw(hole('8s', '6h'), board('Ks 7d 2c'))).toBe(false);
  });
});

describe('classifyTurnCard', () => {
  it('flags an overcard to the flop', () => {
    expect(classifyTurnCard(board('9s 5d 2c'), c('Kh'))).toBe(TurnCardType.Scare);
  });

  it('flags the third card of a suit', () => {
    expect(classifyTurnCard(board('Ks 8s 3d'), c('2s'))).toBe(TurnCardType.Scare);
  });

  it('flags four ranks inside a five-rank window', () => {
    expect(classifyTurnCard(board('9s 7d 6c'), c('8h'))).toBe(TurnCardType.Scare);
  });

  it('calls anything else a blank', () => {
    expect(classifyTurnCard(board('9s 5d 2c'), c('7h'))).toBe(TurnCardType.Blank);
  });

  it('classifies the reference flops', () => {
    expect(classifyTurnCard(board('Qc 7d 3h'), c('5s'))).toBe(TurnCardType.Blank);
    expect(classifyTurnCard(board('Qc 7d 3h'), c('As'))).toBe(TurnCardType.Scare);
    expect(classifyTurnCard(board('Qh 7h 3c'), c('5h'))).toBe(TurnCardType.Scare);
    expect(classifyTurnCard(board('9c 7d Th'), c('8s'))).toBe(TurnCardType.Scare);
  });
});

describe('classifyBarrelTurn', () => {
  it('checks draw completion before broadway cards', () => {
    expect(classifyBarrelTurn(board('Ks 8s 3d'), c('Qs'))).toBe(BarrelTurnType.DrawComplete);
    expect(classifyBarrelTurn(board('9s 7d 6c'), c('8h'))).toBe(BarrelTurnType.DrawComplete);
  });

  it('treats T through A as broadway scare cards', () => {
    expect(classifyBarrelTurn(board('9s 5d 2c'), c('Qh'))).toBe(BarrelTurnType.ScareBroadway);
    expect(classifyBarrelTurn(board('9s 5d 2c'), c('Th'))).toBe(BarrelTurnType.ScareBroadway);
  });

  it('falls back to blank', () => {
    expect(classifyBarrelTurn(board('9s 5d 2c'), c('7h'))).toBe(BarrelTurnType.Blank);
  });
});

describe('classifyTurnStrength', () => {
  const turnBoard = board('9h 5c 2d 3s');

  it.each([
    ['Qs', 'Qd', HandStrength.Strong],
    ['5s', '5h', HandStrength.Strong],
    ['8s', '8h', HandStrength.Medium],
    ['9s', 'Jd', HandStrength.Strong],
    ['9s', 'Td', HandStrength.Medium],
    ['5s', 'Ad', HandStrength.Medium],
    ['9s', '5d', HandStrength.Strong],
    ['Ks', 'Qd', HandStrength.Weak],
  ])('%s%s on 9h 5c 2d 3s is %s', (a, b, expected) => {
    expect(classifyTurnStrength(hole(a, b), turnBoard)).toBe(expected);
  });
});
