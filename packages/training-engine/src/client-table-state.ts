/**
 * Maps a scenario onto the table-state message the web table client renders
 * for live games, so a drill can be shown on the same table component.
 *
 * Seat layout is fixed: 1 = hero, 2 = villain, 0 and 3-5 empty.
 */

import { RANK_SYMBOLS, type Card, Position, type TrainingScenario } from './types.js';

// ── Message shape ───────────────────────────────────────────

export interface ClientCard {
  id: number;
  /** `As`, `10h`, `b` for a hidden card, `''` for an empty board slot. */
  card: string;
  isCombination: boolean;
  isNoCombination: boolean;
}

export interface PreActions {
  check: boolean;
  call: boolean;
  fold: boolean;
  raise: boolean;
  bet: boolean;
}

export interface ClientSeat {
  seat_idx: number;
  player_id: number;
  is_playing: boolean;
  is_active: boolean;
  is_folded: boolean;
  is_all_in: boolean;
  is_in_sit_out: boolean;
  rebuy_time: null;
  stack: { value: number; currency: string };
  name: string;
  bet: number;
  last_action: string;
  cards: ClientCard[];
  action_option: { actions: string[]; min_bet: number; max_bet: number; call_amount: number };
  pre_actions: PreActions;
  country: null;
  image: null;
  isShowdown: boolean;
  emoji: null;
}

export type ClientGameState = 'PreFlop' | 'Flop' | 'Turn' | 'River';

export interface ClientPot {
  pot_id: number;
  value: number;
  displayValue: number;
  position: string;
}

export interface ClientDataState {
  table_id: number;
  display_table_id: string;
  active_seat_idx: number;
  seat_idx_bb: number;
  seat_idx_sb: number;
  seat_idx_button: number;
  pot: number[];
  sb_amount: number;
  bb_amount: number;
  action_time_limit: { secs: number; nanos: number };
  delay_type: string;
  pool_type: string;
  blitz: boolean;
  spectating: boolean;
  pots: ClientPot[][];
}

export interface ClientTableState {
  nt_type: 'NtTableState';
  player_id: number;
  pool_id: number;
  data: {
    data_state: ClientDataState;
    table_state: {
      game_state: ClientGameState;
      community_cards: ClientCard[];
      showdown_state: { first_seat_idx_to_show: number; winners: Record<string, never> };
    };
    seats_state: ClientSeat[];
  };
  service_type: 'free';
}

// ── Constants ───────────────────────────────────────────────

const TRAINING_TABLE_ID = 9999;
const CURRENCY = 'xPKR';
const HERO_SEAT = 1;
const VILLAIN_SEAT = 2;
const SEAT_COUNT = 6;
const BOARD_SLOTS = 5;
const FALLBACK_STACK = 100;

// ── Cards ───────────────────────────────────────────────────

/** The client spells tens out: `10s`, not `Ts`. */
export function toClientCard(card: Card): string {
  const rank = card.rank === 10 ? '10' : RANK_SYMBOLS[card.rank];
  return `${rank}${card.suit}`;
}

function cardSlot(id: number, card: string): ClientCard {
  return { id, card, isCombination: false, isNoCombination: false };
}

function communityCards(board: readonly Card[]): ClientCard[] {
  const slots: ClientCard[] = [];
  for (let i = 0; i < BOARD_SLOTS; i++) {
    const card = board[i];
    slots.push(cardSlot(i, card ? toClientCard(card) : ''));
  }
  return slots;
}

export function gameStateFor(boardLength: number): ClientGameState {
  switch (boardLength) {
    case 0:
      return 'PreFlop';
    case 3:
      return 'Flop';
    case 4:
      return 'Turn';
    default:
      return 'River';
  }
}

// ── Seats ───────────────────────────────────────────────────

function preActions(): PreActions {
  return { check: false, call: false, fold: false, raise: false, bet: false };
}

function emptySeat(seatIdx: number): ClientSeat {
  return {
    seat_idx: seatIdx,
    player_id: 0,
    is_playing: false,
    is_active: false,
    is_folded: false,
    is_all_in: false,
    is_in_sit_out: false,
    rebuy_time: null,
    stack: { value: 0, currency: CURRENCY },
    name: '',
    bet: 0,
    last_action: '',
    cards: [],
    action_option: { actions: [], min_bet: 0, max_bet: 0, call_amount: 0 },
    pre_actions: preActions(),
    country: null,
    image: null,
    isShowdown: false,
    emoji: null,
  };
}

interface SeatMarkers {
  bb: number;
  sb: number;
  button: number;
}

/** Seat index holding BB / SB / BTN among hero and villain; 0 when neither does. */
function seatMarkers(heroPosition: Position, villainPosition: Position): SeatMarkers {
  const markers: SeatMarkers = { bb: 0, sb: 0, button: 0 };
  for (const position of [heroPosition, villainPosition]) {
    const seat = position === heroPosition ? HERO_SEAT : VILLAIN_SEAT;
    if (position === Position.BB) markers.bb = seat;
    else if (position === Position.SB) markers.sb = seat;
    else if (position === Position.BTN) markers.button = seat;
  }
  return markers;
}

// ── Adapter ─────────────────────────────────────────────────

export function toClientTableState(scenario: TrainingScenario, heroPlayerId: number): ClientTableState {
  const setup = scenario.table_setup;
  const villain = setup.players.find((p) => !p.is_hero);
  const hero = setup.players.find((p) => p.is_hero);
  const villainPosition = villain?.position ?? Position.BB;
  const markers = seatMarkers(setup.hero_position, villainPosition);
  const pot = setup.pot_size;
  const currentBet = setup.current_bet;

  const heroSeat: ClientSeat = {
    ...emptySeat(HERO_SEAT),
    player_id: heroPlayerId,
    is_playing: true,
    is_active: true,
    stack: { value: hero?.stack ?? FALLBACK_STACK, currency: CURRENCY },
    name: 'You',
    cards: setup.hero_hand.map((card, i) => cardSlot(i, toClientCard(card))),
    action_option: { actions: [], min_bet: 0, max_bet: 0, call_amount: currentBet },
  };

  const villainSeat: ClientSeat = {
    ...emptySeat(VILLAIN_SEAT),
    player_id: heroPlayerId + 1,
    is_playing: true,
    stack: { value: villain?.stack ?? FALLBACK_STACK, currency: CURRENCY },
    name: 'Villain',
    bet: currentBet,
    last_action: currentBet > 0 ? 'Bet' : '',
    cards: [cardSlot(0, 'b'), cardSlot(1, 'b')],
  };

  const seats: ClientSeat[] = [];
  for (let i = 0; i < SEAT_COUNT; i++) {
    if (i === HERO_SEAT) seats.push(heroSeat);
    else if (i === VILLAIN_SEAT) seats.push(villainSeat);
    else seats.push(emptySeat(i));
  }

  return {
    nt_type: 'NtTableState',
    player_id: heroPlayerId,
    pool_id: 0,
    data: {
      data_state: {
        table_id: TRAINING_TABLE_ID,
        display_table_id: `training/${scenario.scenario_id}`,
        active_seat_idx: HERO_SEAT,
        seat_idx_bb: markers.bb,
        seat_idx_sb: markers.sb,
        seat_idx_button: markers.button,
        pot: [pot],
        sb_amount: 1,
        bb_amount: 2,
        action_time_limit: { secs: 0, nanos: 0 },
        delay_type: 'UserActionDelay',
        pool_type: 'CommonHoldem',
        blitz: false,
        spectating: false,
        pots: [[{ pot_id: 0, value: pot, displayValue: pot, position: '' }]],
      },
      table_state: {
        game_state: gameStateFor(setup.board.length),
        community_cards: communityCards(setup.board),
        showdown_state: { first_seat_idx_to_show: 0, winners: {} },
      },
      seats_state: seats,
    },
    service_type: 'free',
  };
}
