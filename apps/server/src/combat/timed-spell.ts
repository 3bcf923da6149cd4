import type { CastMethod, CastResult } from "@runeforge/shared-protocol";
import type { Spell, SpellCaster, SpellInfo, SpellParameters } from "./spell-types";

/** Everything a spell implementation receives from the factory. */
export interface SpellInit {
  castingId: number;
  castMethod: CastMethod;
  caster: SpellCaster;
  spellInfo: SpellInfo;
  parameters: SpellParameters;
}

export interface TimedSpellOptions {
  /** Checked once in `cast()`; any result other than "ok" fails the spell. */
  validate?: (spell: TimedSpell) => CastResult;
  /** Runs when the cast time has elapsed. */
  onExecute?: (spell: TimedSpell) => void;
}

type SpellStatus = "initiating" | "casting" | "finishing" | "finished";

/**
 * Default spell: casts for the tier's cast time, executes, then finishes on
 * the following late update.
 */
export class TimedSpell implements Spell {
  readonly castingId: number;
  readonly spell4Id: number;
  readonly castMethod: CastMethod;
  readonly caster: SpellCaster;
  readonly spellInfo: SpellInfo;

  private status: SpellStatus = "initiating";
  private castElapsedMs = 0;
  private failed = false;
  private result: CastResult = "ok";

  constructor(
    init: SpellInit,
    private readonly options: TimedSpellOptions = {},
  ) {
    this.castingId = init.castingId;
    this.spell4Id = init.spellInfo.tier.id;
    this.castMethod = init.castMethod;
    this.caster = init.caster;
    this.spellInfo = init.spellInfo;
  }

  get isCasting(): boolean {
    return this.status === "casting";
  }

  get isFinished(): boolean {
    return this.status === "finished";
  }

  get isFailed(): boolean {
    return this.failed;
  }

  get castResult(): CastResult {
    return this.result;
  }

  cast(): boolean {
    if (this.status !== "initiating") {
      return false;
    }

    const result = this.options.validate?.(this) ?? "ok";
    if (result !== "ok") {
      this.failed = true;
      this.result = result;
      this.status = "finished";
      return true;
    }

    this.status = "casting";
    return true;
  }

  update(elapsedMs: number): void {
    if (this.status !== "casting") {
      return;
    }
    this.castElapsedMs += elapsedMs;
    if (this.castElapsedMs < this.spellInfo.tier.castTimeMs) {
      return;
    }
    this.status = "finishing";
    this.options.onExecute?.(this);
  }

  lateUpdate(): void {
    if (this.status === "finishing") {
      this.status = "finished";
    }
  }

  isMovingInterrupted(): boolean {
    return this.spellInfo.tier.interruptedByMovement;
  }

  cancelCast(result: CastResult): void {
    if (this.status !== "initiating" && this.status !== "casting") {
      return;
    }
    this.result = result;
    this.status = "finishing";
  }

  dispose(): void {
    this.status = "finished";
  }
}
