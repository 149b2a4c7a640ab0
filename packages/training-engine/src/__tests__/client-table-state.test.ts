import { describe, it, expect } from 'vitest';
import { gameStateFor, toClientCard, toClientTableState } from '../client-table-state.js';
import {
  GameType,
  Position,
  TrainingTopic,
  type PlayerState,
  type TrainingScenario,
} from '../types.js';
import { board, c, hole } from './fixtures.js';

function scenario(overrides: {
  board?: string;
  players?: PlayerState[];
  heroPosition?: Position;
  currentBet?: number;
}): TrainingScenario {
  const heroPosition = overrides.heroPosition ?? Position.BB;
  return {
    scenario_id: 'PO-0000BEEF',
    topic: TrainingTopic.PotOddsAndEquity,
    branch_key: 'FlushDraw:Call',
    table_setup: {
      game_type: GameType.CashGame,
      hero_position: heroPosition,
      hero_hand: hole('Th', '9h'),
      board: overrides.board === undefined ? board('Kh 7h 2c') : overrides.board === '' ? [] : board(overrides.board),
      players: overrides.players ?? [
        { seat: 1, position: Position.BTN, stack: 180, is_hero: false, is_active: true },
        { seat: 2, position: heroPosition, stack: 200, is_hero: true, is_active: true },
      ],
      pot_size: 24,
      current_bet: overrides.currentBet ?? 12,
    },
    question: 'Call or fold?',
    answers: [
      { id: 'A', text: 'Call', is_correct: true, explanation: 'Correct.' },
      { id: 'B', text: 'Fold', is_correct: false, explanation: 'Too tight.' },
    ],
  };
}

describe('toClientCard', () => {
  it('spells tens out', () => {
    expect(toClientCard(c('Th'))).toBe('10h');
  });

  it('keeps other ranks as symbols', () => {
    expect(toClientCard(c('As'))).toBe('As');
    expect(toClientCard(c('9d'))).toBe('9d');
  });
});

describe('gameStateFor', () => {
  it.each([
    [0, 'PreFlop'],
    [3, 'Flop'],
    [4, 'Turn'],
    [5, 'River'],
  ])('%i board cards -> %s', (n, expected) => {
    expect(gameStateFor(n)).toBe(expected);
  });
});

describe('toClientTableState', () => {
  it('pads the board to five slots', () => {
    const state = toClientTableState(scenario({}), 7);
    const cards = state.data.table_state.community_cards;
    expect(cards.map((x) => x.card)).toEqual(['Kh', '7h', '2c', '', '']);
    expect(cards.map((x) => x.id)).toEqual([0, 1, 2, 3, 4]);
    expect(state.data.table_state.game_state).toBe('Flop');
  });

  it('seats hero at 1 and villain at 2 of six', () => {
    const seats = toClientTableState(scenario({}), 7).data.seats_state;
    expect(seats.map((s) => s.seat_idx)).toEqual([0, 1, 2, 3, 4, 5]);

    const hero = seats[1];
    expect(hero?.player_id).toBe(7);
    expect(hero?.name).toBe('You');
    expect(hero?.is_active).toBe(true);
    expect(hero?.stack).toEqual({ value: 200, currency: 'xPKR' });
    expect(hero?.cards.map((x) => x.card)).toEqual(['10h', '9h']);
    expect(hero?.action_option.call_amount).toBe(12);

    const villain = seats[2];
    expect(villain?.player_id).toBe(8);
    expect(villain?.is_active).toBe(false);
    expect(villain?.bet).toBe(12);
    expect(villain?.last_action).toBe('Bet');
    expect(villain?.stack.value).toBe(180);
    expect(villain?.cards.map((x) => x.card)).toEqual(['b', 'b']);

    for (const i of [0, 3, 4, 5]) {
      expect(seats[i]?.player_id).toBe(0);
      expect(seats[i]?.is_playing).toBe(false);
    }
  });

  it('leaves last_action empty in an unopened pot', () => {
    const villain = toClientTableState(scenario({ currentBet: 0 }), 1).data.seats_state[2];
    expect(villain?.bet).toBe(0);
    expect(villain?.last_action).toBe('');
  });

  it('marks blind and button seats among hero and villain', () => {
    const bbVsBtn = toClientTableState(scenario({}), 1).data.data_state;
    expect(bbVsBtn.seat_idx_bb).toBe(1);
    expect(bbVsBtn.seat_idx_button).toBe(2);
    expect(bbVsBtn.seat_idx_sb).toBe(0);

    const coVsUtg = toClientTableState(
      scenario({
        heroPosition: Position.CO,
        players: [
          { seat: 1, position: Position.UTG, stack: 100, is_hero: false, is_active: true },
          { seat: 2, position: Position.CO, stack: 100, is_hero: true, is_active: true },
        ],
      }),
      1,
    ).data.data_state;
    expect([coVsUtg.seat_idx_bb, coVsUtg.seat_idx_sb, coVsUtg.seat_idx_button]).toEqual([0, 0, 0]);
  });

  it('falls back to a 100 chip stack and a BB villain without players', () => {
    const state = toClientTableState(scenario({ players: [], heroPosition: Position.SB }), 1);
    const seats = state.data.seats_state;
    expect(seats[1]?.stack.value).toBe(100);
    expect(seats[2]?.stack.value).toBe(100);
    expect(state.data.data_state.seat_idx_sb).toBe(1);
    expect(state.data.data_state.seat_idx_bb).toBe(2);
  });

  it('fills the fixed table fields', () => {
    const state = toClientTableState(scenario({ board: '' }), 42);
    expect(state.nt_type).toBe('NtTableState');
    expect(state.player_id).toBe(42);
    expect(state.service_type).toBe('free');
    expect(state.data.table_state.game_state).toBe('PreFlop');

    const data = state.data.data_state;
    expect(data.table_id).toBe(9999);
    expect(data.display_table_id).toBe('training/PO-0000BEEF');
    expect(data.active_seat_idx).toBe(1);
    expect(data.sb_amount).toBe(1);
    expect(data.bb_amount).toBe(2);
    expect(data.pot).toEqual([24]);
    expect(data.pots).toEqual([[{ pot_id: 0, value: 24, displayValue: 24, position: '' }]]);
  });
});
