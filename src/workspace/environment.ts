import { type Literal, integer } from "../expression/literal.ts";
import type { VariableLookup } from "../expression/types.ts";
import type { VariableName } from "../types.ts";

export type EnvironmentTier = "global" | "override";

/**
 * Two-tier variable store. Overrides shadow globals on lookup.
 */
export class Environment implements VariableLookup {
  private readonly globals = new Map<VariableName, Literal>();
  private readonly overrides = new Map<VariableName, Literal>();

  /** Environment pre-populated with `BIT_0` … `BIT_63`. */
  static withDefaults(): Environment {
    const environment = new Environment();
    for (let i = 0; i < 64; i++) {
      environment.set(`BIT_${i}`, integer(1n << BigInt(i)));
    }
    return environment;
  }

  get(name: VariableName): Literal | undefined {
    return this.overrides.get(name) ?? this.globals.get(name);
  }

  set(name: VariableName, value: Literal, tier: EnvironmentTier = "global"): void {
    this.tierMap(tier).set(name, value);
  }

  clearOverrides(): void {
    this.overrides.clear();
  }

  private tierMap(tier: EnvironmentTier): Map<VariableName, Literal> {
    return tier === "override" ? this.overrides : this.globals;
  }
}
