//gamecore/shared/Player.ts

import { GameConfig } from "../config/GameConfig";
import { copyPotion, type Potion } from "./Potion";
import { copyRect, type Rect } from "./Rect";

export interface Direction {
  up: boolean;
  down: boolean;
  left: boolean;
  right: boolean;
}

export interface JumpState {
  jumping: boolean;
  offset: number;
  ascending: boolean;
}

/**
 * One participant as the server stores it and the wire carries it.
 *
 * The owning client authors `direction` and `jump` (input layer) and
 * integrates `body`/`acceleration` locally; the server only ever replaces
 * the whole record.
 */
export interface Player {
  name: string;
  body: Rect;
  direction: Direction;
  /** Intent captured at the most recent tick that had any. */
  lastDirection: Direction;
  acceleration: number;
  jump: JumpState;
  hp: number;
  mp: number;
  str: number;
  /** Advisory; stats are not changed by pickups. */
  ate: Potion | null;
}

export function emptyDirection(): Direction {
  return { up: false, down: false, left: false, right: false };
}

export function copyDirection(d: Direction): Direction {
  return { up: d.up, down: d.down, left: d.left, right: d.right };
}

export function hasIntent(d: Direction): boolean {
  return d.up || d.down || d.left || d.right;
}

export function createPlayer(name: string): Player {
  return {
    name,
    body: {
      x: GameConfig.PLAYER_SPAWN_X,
      y: GameConfig.PLAYER_SPAWN_Y,
      w: GameConfig.PLAYER_WIDTH,
      h: GameConfig.PLAYER_HEIGHT,
    },
    direction: emptyDirection(),
    lastDirection: emptyDirection(),
    acceleration: 0,
    jump: { jumping: false, offset: 0, ascending: false },
    hp: GameConfig.PLAYER_MAX_HP,
    mp: GameConfig.PLAYER_MAX_MP,
    str: GameConfig.PLAYER_MAX_STR,
    ate: null,
  };
}

export function clonePlayer(p: Player): Player {
  return {
    name: p.name,
    body: copyRect(p.body),
    direction: copyDirection(p.direction),
    lastDirection: copyDirection(p.lastDirection),
    acceleration: p.acceleration,
    jump: { ...p.jump },
    hp: p.hp,
    mp: p.mp,
    str: p.str,
    ate: p.ate ? copyPotion(p.ate) : null,
  };
}
