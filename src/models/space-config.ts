/**
 * Per-space overrides.
 *
 * A space is addressed by its 1-based index. Overrides come from
 * `space <n> --label` and `config --space <n> <key> <value>` lines.
 *
 * @module space-config
 */

import { z } from "zod";
import { LayoutSchema } from "./enums.ts";

export const SpaceConfigSchema = z.object({
  index: z.number().int().min(1, "Space index is 1-based"),
  label: z.string().min(1).optional(),
  layout: LayoutSchema.optional(),
  window_gap: z.number().int().optional(),
  top_padding: z.number().int().optional(),
  bottom_padding: z.number().int().optional(),
  left_padding: z.number().int().optional(),
  right_padding: z.number().int().optional(),
});

export type SpaceConfig = Readonly<z.output<typeof SpaceConfigSchema>>;

/**
 * Integer settings a space may override, in emission order
 */
export const SPACE_GAP_KEYS = [
  "window_gap",
  "top_padding",
  "bottom_padding",
  "left_padding",
  "right_padding",
] as const;
export type SpaceGapKey = typeof SPACE_GAP_KEYS[number];

export function isSpaceGapKey(key: string): key is SpaceGapKey {
  return SPACE_GAP_KEYS.some((k) => k === key);
}

export function hasCustomization(space: SpaceConfig): boolean {
  return space.label !== undefined || space.layout !== undefined ||
    SPACE_GAP_KEYS.some((key) => space[key] !== undefined);
}

export function spaceDisplayName(space: SpaceConfig): string {
  return space.label ?? `Space ${space.index}`;
}
