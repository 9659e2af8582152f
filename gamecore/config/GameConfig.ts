//gamecore/config/GameConfig.ts

export const GameConfig = {
  MAX_PLAYERS: 2,

  SCREEN_WIDTH: 640,
  SCREEN_HEIGHT: 480,

  PLAYER_WIDTH: 34,
  PLAYER_HEIGHT: 44,
  PLAYER_SPAWN_X: 100,
  PLAYER_SPAWN_Y: 100,

  PLAYER_MAX_HP: 100,
  PLAYER_MAX_MP: 30,
  PLAYER_MAX_STR: 10,

  // Pixels per render tick at full acceleration
  PLAYER_MOVE_SPEED: 10,
  ACCEL_STEP: 0.25,
  ACCEL_MAX: 1,
  ACCEL_FRICTION: 0.5,
  ACCEL_MIN: 0,

  JUMP_HEIGHT: 32,
  JUMP_EASE: 0.5,
  JUMP_MIN_STEP: 2,

  POTION_SIZE: 16,
  POTIONS_PER_GAME: 1,
} as const;
