//gamecore/shared/Potion.ts

import { GameConfig } from "../config/GameConfig";
import { pick, randomInt, type RandomSource } from "../utils/Rng";
import { copyRect, type Rect } from "./Rect";

export const POTION_TYPES = ["Health", "Mana"] as const;

export type PotionType = (typeof POTION_TYPES)[number];

export interface Potion {
  position: Rect;
  type: PotionType;
}

/** Place a potion of random type fully inside the screen. */
export function spawnPotion(rng: RandomSource): Potion {
  const size = GameConfig.POTION_SIZE;
  return {
    position: {
      x: randomInt(rng, 0, GameConfig.SCREEN_WIDTH - size),
      y: randomInt(rng, 0, GameConfig.SCREEN_HEIGHT - size),
      w: size,
      h: size,
    },
    type: pick(rng, POTION_TYPES),
  };
}

export function copyPotion(p: Potion): Potion {
  return { position: copyRect(p.position), type: p.type };
}
