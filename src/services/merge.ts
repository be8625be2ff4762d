import type { StopEvent } from "../types/departure";

const present = (value?: string): value is string => value !== undefined && value !== "";

/**
 * Overlay one change record onto its planned counterpart. Live values win
 * when the change carries them; planned values are only backfilled.
 */
export const applyChange = (base: StopEvent, change: StopEvent): StopEvent => ({
  id: base.id,
  lineLabel: present(change.lineLabel) ? change.lineLabel : base.lineLabel,
  plannedTime: base.plannedTime ?? change.plannedTime,
  liveTime: change.liveTime ?? base.liveTime,
  plannedPlatform: present(base.plannedPlatform) ? base.plannedPlatform : change.plannedPlatform,
  livePlatform: present(change.livePlatform) ? change.livePlatform : base.livePlatform,
  destination: present(change.destination) ? change.destination : base.destination,
  cancelled: base.cancelled || change.cancelled,
});

/**
 * Full outer join of planned stops and change records on stop id.
 *
 * Planned stops keep their order; change records without a planned
 * counterpart (added or unscheduled stops) follow in change order. Inputs
 * are left untouched, and merging the same changes again is a no-op.
 */
export function mergePlanWithChanges(
  baseline: readonly StopEvent[],
  changes: ReadonlyMap<string, StopEvent>
): StopEvent[] {
  const byId = new Map<string, StopEvent>();
  for (const event of baseline) {
    byId.set(event.id, event);
  }

  for (const [id, change] of changes) {
    const base = byId.get(id);
    byId.set(id, base ? applyChange(base, change) : { ...change, id });
  }

  return [...byId.values()];
}
