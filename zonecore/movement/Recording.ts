// zonecore/movement/Recording.ts

import type { TickContext } from "../engine/TickContext";
import type { ZoneEntity } from "../shared/Entity";
import { readList, readRecord } from "../shared/Metadata";

function updateTask(ctx: TickContext, monster: ZoneEntity, patch: Record<string, unknown>): void {
  const task = readRecord(monster.metadata.current_task);
  ctx.setMetadata(monster, { ...monster.metadata, current_task: { ...task, ...patch } });
}

export function startRecording(ctx: TickContext, playerId: string, monster: ZoneEntity): void {
  updateTask(ctx, monster, { is_recording: true, is_playing: false, actions: [] });
  ctx.emit({ type: "recording_started", target_player_id: playerId });
}

export function stopRecording(ctx: TickContext, playerId: string, monster: ZoneEntity): void {
  updateTask(ctx, monster, { is_recording: false });
  ctx.emit({ type: "recording_stopped", target_player_id: playerId });
}

export function startAutorepeat(ctx: TickContext, playerId: string, monster: ZoneEntity): void {
  const actions = readList(readRecord(monster.metadata.current_task).actions);
  if (actions.length === 0) {
    ctx.emit({ type: "error", message: "No recorded actions to replay", target_player_id: playerId });
    return;
  }
  updateTask(ctx, monster, { is_playing: true, is_recording: false, play_index: 0 });
  ctx.emit({ type: "autorepeat_started", target_player_id: playerId });
}

export function stopAutorepeatIntent(ctx: TickContext, playerId: string, monster: ZoneEntity): void {
  updateTask(ctx, monster, { is_playing: false });
  ctx.emit({ type: "autorepeat_stopped", target_player_id: playerId });
}
