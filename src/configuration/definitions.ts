/**
 * Crafting settings schema.
 *
 * Role in system:
 * - Single source of defaults and validation for the admin-managed switches.
 * - The parsed value is passed explicitly into every engine call; nothing reads
 *   settings from a process-wide singleton.
 *
 * Invariants:
 * - Every field falls back to its default when missing or invalid (`.catch`),
 *   so a half-broken settings document never disables validation.
 */
import { z } from "zod";

export const CraftingSettingsSchema = z.object({
  /** Globally enable crafting commands. */
  enabled: z.boolean().catch(true),
  /** Cooldown (in seconds) applied after any craft. */
  globalCooldownSeconds: z.number().nonnegative().catch(10),
  /** Allow players to run auto-crafting loops. */
  allowAutoCrafting: z.boolean().catch(false),
  /** How long staging sessions live before expiring. */
  sessionTimeoutMinutes: z.number().positive().catch(10),
});

export type CraftingSettings = Readonly<z.infer<typeof CraftingSettingsSchema>>;

export const DEFAULT_CRAFTING_SETTINGS: CraftingSettings = Object.freeze(
  CraftingSettingsSchema.parse({}),
);

/** Apply defaults and validation to a partial or untrusted settings value. */
export function parseCraftingSettings(raw: unknown): CraftingSettings {
  const source = raw && typeof raw === "object" ? raw : {};
  return Object.freeze(CraftingSettingsSchema.parse(source));
}
