// zonecore/intents/IntentTypes.ts
//
// Intent payloads as a closed union keyed by `action`. Fields that handlers
// interpret leniently (skill lists, optional monster references) stay
// `unknown` here so the handler can report a rule violation instead of the
// intent vanishing.

import { z } from "zod";

const entityId = z.string().min(1);

const monsterRef = {
  monster_id: z.unknown().optional(),
  entity_id: z.unknown().optional(),
};

const step = {
  entity_id: entityId,
  direction: z.unknown().optional(),
  dx: z.unknown().optional(),
  dy: z.unknown().optional(),
};

export const MoveIntentSchema = z.object({ action: z.literal("move"), ...step });
export const PushIntentSchema = z.object({ action: z.literal("push"), ...step });

export const SpawnMonsterIntentSchema = z.object({
  action: z.literal("spawn_monster"),
  monster_type: z.unknown().optional(),
  name: z.unknown().optional(),
  transferable_skills: z.unknown().optional(),
});

export const OwnerDisconnectIntentSchema = z.object({
  action: z.literal("owner_disconnect"),
  player_id: entityId,
});

export const RecordingStartIntentSchema = z.object({ action: z.literal("recording_start"), ...monsterRef });
export const RecordingStopIntentSchema = z.object({ action: z.literal("recording_stop"), ...monsterRef });
export const AutorepeatStartIntentSchema = z.object({ action: z.literal("autorepeat_start"), ...monsterRef });
export const AutorepeatStopIntentSchema = z.object({ action: z.literal("autorepeat_stop"), ...monsterRef });

export const SelectRecipeIntentSchema = z.object({
  action: z.literal("select_recipe"),
  workshop_id: entityId,
  recipe_id: z.unknown().optional(),
  ...monsterRef,
});

export const InteractIntentSchema = z.object({ action: z.literal("interact"), ...monsterRef });
export const HitchWagonIntentSchema = z.object({ action: z.literal("hitch_wagon"), ...monsterRef });
export const UnhitchWagonIntentSchema = z.object({ action: z.literal("unhitch_wagon"), ...monsterRef });
export const UnloadWagonIntentSchema = z.object({ action: z.literal("unload_wagon"), ...monsterRef });

export const ZoneIntentSchema = z.discriminatedUnion("action", [
  MoveIntentSchema,
  PushIntentSchema,
  SpawnMonsterIntentSchema,
  OwnerDisconnectIntentSchema,
  RecordingStartIntentSchema,
  RecordingStopIntentSchema,
  AutorepeatStartIntentSchema,
  AutorepeatStopIntentSchema,
  SelectRecipeIntentSchema,
  InteractIntentSchema,
  HitchWagonIntentSchema,
  UnhitchWagonIntentSchema,
  UnloadWagonIntentSchema,
]);

export type ZoneIntent = z.infer<typeof ZoneIntentSchema>;

export const ZONE_ACTIONS: ReadonlySet<string> = new Set<string>(
  ZoneIntentSchema.options.map((option) => option.shape.action.value),
);
