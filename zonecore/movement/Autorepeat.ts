// zonecore/movement/Autorepeat.ts
//
// Replays one recorded step per tick for every monster in playback. Any step
// that cannot be carried out ends the playback.

import type { TickContext } from "../engine/TickContext";
import type { ZoneEntity } from "../shared/Entity";
import { EntityKind } from "../shared/Kinds";
import { isRecord, readInt, readList, readRecord, truthy } from "../shared/Metadata";
import { intentDelta, isPushable, stepMonster } from "./MoveResolver";
import { attemptPush, canMonsterPush, clearActivePush, markActivePush } from "./PushResolver";

export function stopAutorepeat(ctx: TickContext, monster: ZoneEntity): void {
  const task = readRecord(monster.metadata.current_task);
  ctx.setMetadata(monster, { ...monster.metadata, current_task: { ...task, is_playing: false } });
}

export function processAutorepeat(ctx: TickContext): void {
  for (const monster of ctx.entities()) {
    if (ctx.kindOf(monster) !== EntityKind.Monster) continue;
    if (!truthy(readRecord(monster.metadata.current_task).is_playing)) continue;
    replayStep(ctx, monster);
  }
}

/** Carries out one step; false when playback had to stop. */
function performStep(ctx: TickContext, monster: ZoneEntity, step: Record<string, unknown>): boolean {
  const [dx, dy] = intentDelta(step);
  if (dx === 0 && dy === 0) return true;

  const newX = monster.x + dx;
  const newY = monster.y + dy;
  if (!ctx.inBounds(newX, newY, monster)) return false;
  if (ctx.terrainBlocked(newX, newY)) return false;

  const blocker = ctx.blockerFor(monster, newX, newY);
  if (step.action !== "push") {
    if (blocker !== null) return false;
    stepMonster(ctx, monster, newX, newY);
    return true;
  }

  if (blocker === null || !isPushable(ctx, blocker)) return false;
  if (!canMonsterPush(ctx, monster, blocker).ok) return false;

  markActivePush(ctx, blocker, monster.id);
  const pushed = attemptPush(ctx, monster, blocker, dx, dy);
  clearActivePush(ctx, blocker);
  return pushed;
}

function replayStep(ctx: TickContext, monster: ZoneEntity): void {
  const actions = readList(readRecord(monster.metadata.current_task).actions);
  if (actions.length === 0) {
    stopAutorepeat(ctx, monster);
    return;
  }

  let index = readInt(readRecord(monster.metadata.current_task).play_index ?? 0, 0);
  if (index < 0 || index >= actions.length) index = 0;
  const step = actions[index];

  if (!performStep(ctx, monster, isRecord(step) ? step : {})) {
    stopAutorepeat(ctx, monster);
    return;
  }

  const task = readRecord(monster.metadata.current_task);
  ctx.setMetadata(monster, {
    ...monster.metadata,
    current_task: { ...task, play_index: (index + 1) % actions.length },
  });
  ctx.emit({ type: "autorepeat_step", target_player_id: monster.ownerId });
}
