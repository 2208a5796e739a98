import { compareIds, flagId, type FlagId, type PlatformId } from "./ids.js";
import {
  FALSE,
  booleanValue,
  decodeValue,
  textValue,
  toRawValue,
  valuesEqual,
  type RawValue,
  type Value,
} from "./value.js";

const PLATFORM_FLAG = flagId("platform");
const KERNEL_PLATFORM_FLAG = flagId("kernel-platform");

/**
 * Mapping of flag ids to values. Iteration is always in lexicographic flag
 * order so generated command lines and persisted documents are reproducible.
 *
 * `merge`, `set`, `setBool` and `setText` are the only mutation paths.
 */
export class Setting {
  private readonly values = new Map<FlagId, Value>();

  static empty(): Setting {
    return new Setting();
  }

  static fromEntries(entries: Iterable<[FlagId, Value]>): Setting {
    const setting = new Setting();
    for (const [id, value] of entries) {
      setting.set(id, value);
    }
    return setting;
  }

  /**
   * Build a Setting from flattened document fields. Returns the keys whose
   * values are neither boolean, string nor number so callers can report them.
   */
  static fromRecord(record: Record<string, unknown>): { setting: Setting; invalid: string[] } {
    const setting = new Setting();
    const invalid: string[] = [];
    for (const [key, raw] of Object.entries(record)) {
      const value = decodeValue(raw);
      if (value) {
        setting.set(flagId(key), value);
      } else {
        invalid.push(key);
      }
    }
    return { setting, invalid };
  }

  get size(): number {
    return this.values.size;
  }

  has(id: FlagId): boolean {
    return this.values.has(id);
  }

  get(id: FlagId): Value | undefined {
    return this.values.get(id);
  }

  /** Current value of a flag; an absent flag reads as `false`. */
  flag(id: FlagId): Value {
    return this.values.get(id) ?? FALSE;
  }

  set(id: FlagId, value: Value): this {
    this.values.set(id, value);
    return this;
  }

  setBool(id: FlagId, value: boolean): this {
    return this.set(id, booleanValue(value));
  }

  setText(id: FlagId, value: string): this {
    return this.set(id, textValue(value));
  }

  setPlatform(platform: string): this {
    return this.setText(PLATFORM_FLAG, platform);
  }

  setKernelPlatform(platform: PlatformId): this {
    return this.setText(KERNEL_PLATFORM_FLAG, platform);
  }

  /** Merge a later layer into this one; the later layer's values win. */
  merge(other: Setting): this {
    for (const [id, value] of other.values) {
      this.values.set(id, value);
    }
    return this;
  }

  entries(): Array<[FlagId, Value]> {
    return [...this.values.entries()].sort(([a], [b]) => compareIds(a, b));
  }

  keys(): FlagId[] {
    return this.entries().map(([id]) => id);
  }

  clone(): Setting {
    return Setting.fromEntries(this.values.entries());
  }

  equals(other: Setting): boolean {
    if (this.values.size !== other.values.size) return false;
    for (const [id, value] of this.values) {
      const otherValue = other.values.get(id);
      if (!otherValue || !valuesEqual(value, otherValue)) return false;
    }
    return true;
  }

  toRecord(): Record<string, RawValue> {
    return Object.fromEntries(this.entries().map(([id, value]) => [id, toRawValue(value)]));
  }
}
