import { describe, it, expect } from 'vitest';
import { PushTier, TournamentStage, classifyPushTier, pushThresholdBb } from '../topics/preflop.js';
import { hole } from './fixtures.js';

describe('classifyPushTier', () => {
  it.each([
    ['Qs', 'Qd', PushTier.Premium],
    ['As', 'Ks', PushTier.Premium],
    ['Ts', 'Td', PushTier.Strong],
    ['Ah', 'Qd', PushTier.Strong],
    ['7s', '7d', PushTier.Playable],
    ['Ah', 'Th', PushTier.Playable],
    ['Qh', 'Jh', PushTier.Playable],
    ['Qh', 'Jd', PushTier.Weak],
    ['6s', '6d', PushTier.Weak],
  ])('%s%s is %s', (a, b, expected) => {
    expect(classifyPushTier(hole(a, b))).toBe(expected);
  });
});

describe('pushThresholdBb', () => {
  it('uses the stage base for playable hands', () => {
    expect(pushThresholdBb(TournamentStage.EarlyLevels, PushTier.Playable)).toBe(20);
    expect(pushThresholdBb(TournamentStage.MiddleStages, PushTier.Playable)).toBe(15);
    expect(pushThresholdBb(TournamentStage.Bubble, PushTier.Playable)).toBe(10);
    expect(pushThresholdBb(TournamentStage.FinalTable, PushTier.Playable)).toBe(12);
  });

  it('widens for stronger tiers and tightens for weak ones', () => {
    expect(pushThresholdBb(TournamentStage.Bubble, PushTier.Premium)).toBe(18);
    expect(pushThresholdBb(TournamentStage.Bubble, PushTier.Strong)).toBe(13);
    expect(pushThresholdBb(TournamentStage.Bubble, PushTier.Weak)).toBe(6);
  });
});
