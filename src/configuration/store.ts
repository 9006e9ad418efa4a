import { deepClone } from "@/db/helpers";
import { OkResult, type Result } from "@/utils/result";
import type { CraftingSettings } from "./definitions";
import type { SettingsProvider } from "./provider";

const CACHE_TTL_MS = 30_000;

/**
 * Caches the settings read from a provider.
 *
 * Gotchas:
 * - Admin changes take up to `ttlMs` to be observed; call `invalidate` after
 *   writing settings from the same process.
 */
export class SettingsStore {
  private cached: { expiresAt: number; value: CraftingSettings } | null = null;

  constructor(
    private readonly provider: SettingsProvider,
    private readonly ttlMs: number = CACHE_TTL_MS,
  ) {}

  async get(): Promise<Result<CraftingSettings, Error>> {
    const now = Date.now();
    if (this.cached && this.cached.expiresAt > now) {
      return OkResult(deepClone(this.cached.value));
    }

    const loaded = await this.provider.load();
    if (loaded.isErr()) return loaded;

    const value = loaded.unwrap();
    this.cached = { expiresAt: now + this.ttlMs, value };
    return OkResult(deepClone(value));
  }

  invalidate(): void {
    this.cached = null;
  }
}
