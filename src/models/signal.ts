/**
 * Signal model.
 *
 * A `signal --add` line: run an action when the window manager reports an
 * event. Event names outside the known catalog are kept as written.
 *
 * @module signal
 */

import { z } from "zod";
import { generateId } from "../utils/ids.ts";

export const SignalEventSchema = z.enum([
  "application_launched",
  "application_terminated",
  "application_front_switched",
  "application_activated",
  "application_deactivated",
  "application_visible",
  "application_hidden",
  "window_created",
  "window_destroyed",
  "window_focused",
  "window_moved",
  "window_resized",
  "window_minimized",
  "window_deminimized",
  "window_title_changed",
  "space_created",
  "space_destroyed",
  "space_changed",
  "display_added",
  "display_removed",
  "display_moved",
  "display_resized",
  "display_changed",
  "mission_control_enter",
  "mission_control_exit",
  "dock_did_restart",
  "menu_bar_hidden_changed",
  "system_woke",
]);
export type SignalEvent = z.infer<typeof SignalEventSchema>;

export const SIGNAL_EVENTS: readonly SignalEvent[] = SignalEventSchema.options;

export const SIGNAL_EVENT_DESCRIPTIONS: Record<SignalEvent, string> = {
  application_launched: "When an application is launched",
  application_terminated: "When an application is terminated",
  application_front_switched: "When the frontmost application changes",
  application_activated: "When an application is activated",
  application_deactivated: "When an application is deactivated",
  application_visible: "When an application becomes visible",
  application_hidden: "When an application is hidden",
  window_created: "When a window is created",
  window_destroyed: "When a window is destroyed",
  window_focused: "When a window gains focus",
  window_moved: "When a window is moved",
  window_resized: "When a window is resized",
  window_minimized: "When a window is minimized",
  window_deminimized: "When a window is restored from the dock",
  window_title_changed: "When a window title changes",
  space_created: "When a space is created",
  space_destroyed: "When a space is destroyed",
  space_changed: "When the active space changes",
  display_added: "When a display is added",
  display_removed: "When a display is removed",
  display_moved: "When a display is moved",
  display_resized: "When a display is resized",
  display_changed: "When the active display changes",
  mission_control_enter: "When Mission Control is activated",
  mission_control_exit: "When Mission Control is exited",
  dock_did_restart: "When the Dock restarts",
  menu_bar_hidden_changed: "When menu bar visibility changes",
  system_woke: "When the system wakes from sleep",
};

export const SignalSchema = z.object({
  id: z.string().min(1, "Signal id must be non-empty"),
  event: z.string().min(1, "Signal event is required"),
  action: z.string().min(1, "Signal action is required"),
  label: z.string().min(1).optional(),
  enabled: z.boolean().default(true),
});

export type Signal = Readonly<z.output<typeof SignalSchema>>;

export function createSignal(
  event: string,
  action: string,
  fields: { id?: string; label?: string; enabled?: boolean } = {},
): Signal {
  return SignalSchema.parse({ ...fields, id: fields.id ?? generateId("signal"), event, action });
}

export function isKnownSignalEvent(event: string): event is SignalEvent {
  return SignalEventSchema.safeParse(event).success;
}

export function describeSignalEvent(event: string): string {
  return isKnownSignalEvent(event)
    ? SIGNAL_EVENT_DESCRIPTIONS[event]
    : `Unknown event: ${event}`;
}

/**
 * "window_focused" -> "Window Focused"
 */
export function signalEventDisplayName(event: string): string {
  return event
    .split("_")
    .map((word) => (word ? word[0].toUpperCase() + word.substring(1) : ""))
    .join(" ");
}
