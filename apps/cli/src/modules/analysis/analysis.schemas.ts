// apps/cli/src/modules/analysis/analysis.schemas.ts
import type { TypeName } from "../../shared/types";
import type { DamageClass } from "../moves/moves.schemas";
import type { TierGroups } from "../types/types.chart";

export type OffenseCoverageEntry = {
  pokemon: string;
  /** The member's own types that hit this type for more than neutral damage. */
  via: string[];
};

export type DefenseCoverageEntry = {
  pokemon: string;
  multiplier: number;
};

/**
 * Keys are every type name in alphabetical order; an empty list means no coverage.
 */
export type CoverageReport = {
  offense: Record<TypeName, OffenseCoverageEntry[]>;
  defense: Record<TypeName, DefenseCoverageEntry[]>;
};

export type MatchupOptions = {
  verbose: boolean;
  stabOnly: boolean;
};

export type MoveMatch = {
  name: string;
  type: string;
  damageClass: DamageClass;
  stab: boolean;
  multiplier: number;
};

export type MatchupDirection = {
  attacker: string;
  defender: string;
  moves: TierGroups<MoveMatch>;
};

/**
 * Both directions, computed independently.
 */
export type MatchupReport = {
  offense: MatchupDirection;
  defense: MatchupDirection;
};
