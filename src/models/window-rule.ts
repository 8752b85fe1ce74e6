/**
 * Window rule model.
 *
 * A `rule --add` line of the directive config: a selector (app name and/or
 * title pattern) plus the properties applied to matching windows. The app
 * name is kept without `^`/`$` anchors; the generator adds them.
 *
 * @module window-rule
 */

import { z } from "zod";
import { WindowLayerSchema } from "./enums.ts";
import { generateId } from "../utils/ids.ts";

export const WindowRuleSchema = z
  .object({
    id: z.string().min(1, "Rule id must be non-empty"),
    app_name: z.string().min(1).optional(),
    title: z.string().min(1).optional(),
    manage: z.boolean().default(true),
    sticky: z.boolean().optional(),
    layer: WindowLayerSchema.optional(),
    space: z.number().int().positive().optional(),
    enabled: z.boolean().default(true),
  })
  .refine((rule) => rule.app_name !== undefined || rule.title !== undefined, {
    message: "Rule needs an app_name or title selector",
  });

export type WindowRule = Readonly<z.output<typeof WindowRuleSchema>>;

/**
 * Fields accepted when creating a rule; the id is generated when omitted
 */
export type WindowRuleInput = Omit<WindowRule, "id" | "manage" | "enabled"> & {
  readonly id?: string;
  readonly manage?: boolean;
  readonly enabled?: boolean;
};

export function createWindowRule(input: WindowRuleInput): WindowRule {
  return WindowRuleSchema.parse({ ...input, id: input.id ?? generateId("rule") });
}

/**
 * Remove one leading `^` and one trailing `$` from an app pattern
 */
export function stripAnchors(pattern: string): string {
  return pattern.replace(/^\^/, "").replace(/\$$/, "");
}

/**
 * Whether the rule selects windows of exactly this app
 */
export function ruleTargetsApp(rule: WindowRule, appName: string): boolean {
  return rule.app_name === appName;
}
