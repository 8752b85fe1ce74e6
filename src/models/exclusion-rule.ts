/**
 * Exclusion rule model.
 *
 * A narrower view of rule lines used to keep apps out of tiling: every
 * exclusion targets one app and carries a fixed set of actions. Exclusions
 * are kept in an ordered list; their order is the emission order.
 *
 * @module exclusion-rule
 */

import { z } from "zod";
import { WindowLayerSchema } from "./enums.ts";
import { generateId } from "../utils/ids.ts";

export const ExclusionRuleSchema = z.object({
  id: z.string().min(1, "Exclusion id must be non-empty"),
  app_name: z.string().min(1, "Exclusion app_name must be non-empty"),
  title_pattern: z.string().min(1).optional(),
  manage_off: z.boolean().default(true),
  sticky: z.boolean().default(false),
  layer: WindowLayerSchema.default("normal"),
  assigned_space: z.number().int().positive().optional(),
  enabled: z.boolean().default(true),
});

export type ExclusionRule = Readonly<z.output<typeof ExclusionRuleSchema>>;
export type ExclusionRuleInput = z.input<typeof ExclusionRuleSchema>;

/**
 * Create an exclusion for an app; by default it only turns management off
 */
export function createExclusionRule(
  appName: string,
  fields: Partial<Omit<ExclusionRuleInput, "app_name">> = {},
): ExclusionRule {
  return ExclusionRuleSchema.parse({
    ...fields,
    id: fields.id ?? generateId("exclusion"),
    app_name: appName,
  });
}

/**
 * Whether the exclusion would emit any action
 */
export function exclusionHasActions(rule: ExclusionRule): boolean {
  return rule.manage_off || rule.sticky || rule.layer !== "normal" ||
    rule.assigned_space !== undefined;
}

// ============================================================================
// List operations
// ============================================================================

export function addExclusion(
  rules: readonly ExclusionRule[],
  rule: ExclusionRule,
): readonly ExclusionRule[] {
  return [...rules, rule];
}

/**
 * Replace the exclusion with the same id; unknown ids leave the list as is
 */
export function updateExclusion(
  rules: readonly ExclusionRule[],
  rule: ExclusionRule,
): readonly ExclusionRule[] {
  return rules.map((r) => (r.id === rule.id ? rule : r));
}

export function removeExclusion(
  rules: readonly ExclusionRule[],
  id: string,
): readonly ExclusionRule[] {
  return rules.filter((r) => r.id !== id);
}

export function toggleExclusion(
  rules: readonly ExclusionRule[],
  id: string,
): readonly ExclusionRule[] {
  return rules.map((r) => (r.id === id ? { ...r, enabled: !r.enabled } : r));
}

/**
 * Move an exclusion to a new position. Indexes are clamped to the list.
 */
export function moveExclusion(
  rules: readonly ExclusionRule[],
  fromIndex: number,
  toIndex: number,
): readonly ExclusionRule[] {
  if (fromIndex < 0 || fromIndex >= rules.length) {
    return rules;
  }
  const target = Math.max(0, Math.min(toIndex, rules.length - 1));
  const next = [...rules];
  const [moved] = next.splice(fromIndex, 1);
  if (moved === undefined) {
    return rules;
  }
  next.splice(target, 0, moved);
  return next;
}
