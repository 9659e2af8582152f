//gamecore/core/PlayerPhysics.ts

import { GameConfig } from "../config/GameConfig";
import { copyDirection, hasIntent, type Direction, type Player } from "../shared/Player";
import type { Potion } from "../shared/Potion";
import { rectsOverlap } from "../shared/Rect";

/**
 * Local integration for one render tick. Runs on the owning client only;
 * the server never simulates.
 *
 * Order per tick:
 *  1. latch lastDirection / ramp or decay acceleration
 *  2. move along lastDirection at speed * acceleration, wrapping at edges
 *  3. advance the jump cycle
 */
export function stepPlayer(player: Player): void {
  integrateAcceleration(player);
  integratePosition(player);
  integrateJump(player);
}

export function integrateAcceleration(player: Player): void {
  if (hasIntent(player.direction)) {
    player.lastDirection = copyDirection(player.direction);
    player.acceleration = Math.min(
      GameConfig.ACCEL_MAX,
      player.acceleration + GameConfig.ACCEL_STEP
    );
  } else {
    player.acceleration = Math.max(
      GameConfig.ACCEL_MIN,
      player.acceleration - GameConfig.ACCEL_FRICTION
    );
  }
}

function axis(d: Direction): { dx: number; dy: number } {
  return {
    dx: (d.right ? 1 : 0) - (d.left ? 1 : 0),
    dy: (d.down ? 1 : 0) - (d.up ? 1 : 0),
  };
}

// Modulo that stays positive for negative inputs.
function wrap(value: number, size: number): number {
  return ((value % size) + size) % size;
}

export function integratePosition(player: Player): void {
  if (player.acceleration <= 0) return;

  const speed = GameConfig.PLAYER_MOVE_SPEED * player.acceleration;
  const { dx, dy } = axis(player.lastDirection);

  player.body.x = wrap(player.body.x + dx * speed, GameConfig.SCREEN_WIDTH);
  player.body.y = wrap(player.body.y + dy * speed, GameConfig.SCREEN_HEIGHT);
}

/** Input trigger; ignored while a jump is already in progress. */
export function startJump(player: Player): boolean {
  if (player.jump.jumping) return false;
  player.jump = { jumping: true, offset: 0, ascending: true };
  return true;
}

/**
 * Triangular jump: fast off the ground, slowing into the apex, then
 * speeding back up on the way down. Step size is proportional to the
 * distance from the apex, floored at JUMP_MIN_STEP.
 */
export function integrateJump(player: Player): void {
  const jump = player.jump;
  if (!jump.jumping) return;

  const height = GameConfig.JUMP_HEIGHT;
  const step = Math.max(
    GameConfig.JUMP_MIN_STEP,
    (height - jump.offset) * GameConfig.JUMP_EASE
  );

  if (jump.ascending) {
    jump.offset = Math.min(height, jump.offset + step);
    if (jump.offset >= height) jump.ascending = false;
    return;
  }

  jump.offset = Math.max(0, jump.offset - step);
  if (jump.offset <= 0) {
    jump.jumping = false;
  }
}

/** First potion the player's hitbox overlaps, if any. */
export function touchingPotion(player: Player, potions: readonly Potion[]): Potion | null {
  return potions.find((p) => rectsOverlap(player.body, p.position)) ?? null;
}
