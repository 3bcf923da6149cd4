import { isCastMethod } from "@runeforge/shared-protocol";
import type { SpellBaseDefinition, SpellTierDefinition } from "../combat/spell-types";
import type { CreatureEntry, CreatureModelInfo, GameDataDefinition } from "./game-data-types";

export interface GameDataValidationIssue {
  path: string;
  message: string;
}

export class GameDataValidationError extends Error {
  readonly issues: GameDataValidationIssue[];

  constructor(issues: GameDataValidationIssue[]) {
    super(
      `Game data validation failed:\n${issues.map((issue) => `${issue.path}: ${issue.message}`).join("\n")}`,
    );
    this.name = "GameDataValidationError";
    this.issues = issues;
  }
}

type UnknownRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is UnknownRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);
const isId = (value: unknown): value is number =>
  typeof value === "number" && Number.isInteger(value) && value >= 0;
const isNonNegative = (value: unknown): value is number =>
  typeof value === "number" && Number.isFinite(value) && value >= 0;

const readList = (
  root: UnknownRecord,
  key: string,
  issues: GameDataValidationIssue[],
): unknown[] => {
  const value = root[key];
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    issues.push({ path: key, message: "Expected array" });
    return [];
  }
  return value;
};

const parseSpellBase = (
  value: unknown,
  path: string,
  issues: GameDataValidationIssue[],
): SpellBaseDefinition | undefined => {
  if (!isRecord(value)) {
    issues.push({ path, message: "Expected object" });
    return undefined;
  }
  const { id, name, castMethod } = value;
  if (!isId(id)) issues.push({ path: `${path}.id`, message: "Expected id" });
  if (typeof name !== "string") issues.push({ path: `${path}.name`, message: "Expected string" });
  if (!isCastMethod(castMethod)) {
    issues.push({ path: `${path}.castMethod`, message: `Unknown cast method ${String(castMethod)}` });
  }
  if (!isId(id) || typeof name !== "string" || !isCastMethod(castMethod)) {
    return undefined;
  }
  return { id, name, castMethod };
};

const parseSpellTier = (
  value: unknown,
  path: string,
  issues: GameDataValidationIssue[],
): SpellTierDefinition | undefined => {
  if (!isRecord(value)) {
    issues.push({ path, message: "Expected object" });
    return undefined;
  }
  const { id, baseId, tierIndex, castTimeMs = 0, interruptedByMovement = false } = value;
  if (!isId(id)) issues.push({ path: `${path}.id`, message: "Expected id" });
  if (!isId(baseId)) issues.push({ path: `${path}.baseId`, message: "Expected id" });
  if (!isId(tierIndex)) issues.push({ path: `${path}.tierIndex`, message: "Expected id" });
  if (!isNonNegative(castTimeMs)) {
    issues.push({ path: `${path}.castTimeMs`, message: "Expected non-negative number" });
  }
  if (typeof interruptedByMovement !== "boolean") {
    issues.push({ path: `${path}.interruptedByMovement`, message: "Expected boolean" });
  }
  if (
    !isId(id) ||
    !isId(baseId) ||
    !isId(tierIndex) ||
    !isNonNegative(castTimeMs) ||
    typeof interruptedByMovement !== "boolean"
  ) {
    return undefined;
  }
  return { id, baseId, tierIndex, castTimeMs, interruptedByMovement };
};

const parseCreatureModel = (
  value: unknown,
  path: string,
  issues: GameDataValidationIssue[],
): CreatureModelInfo | undefined => {
  if (!isRecord(value)) {
    issues.push({ path, message: "Expected object" });
    return undefined;
  }
  const { id, hitRadius } = value;
  if (!isId(id)) issues.push({ path: `${path}.id`, message: "Expected id" });
  if (!isNonNegative(hitRadius)) {
    issues.push({ path: `${path}.hitRadius`, message: "Expected non-negative number" });
  }
  if (!isId(id) || !isNonNegative(hitRadius)) {
    return undefined;
  }
  return { id, hitRadius };
};

const parseCreature = (
  value: unknown,
  path: string,
  issues: GameDataValidationIssue[],
): CreatureEntry | undefined => {
  if (!isRecord(value)) {
    issues.push({ path, message: "Expected object" });
    return undefined;
  }
  const { id, modelInfoId, modelScale = 1 } = value;
  if (!isId(id)) issues.push({ path: `${path}.id`, message: "Expected id" });
  if (!isId(modelInfoId)) issues.push({ path: `${path}.modelInfoId`, message: "Expected id" });
  if (!isNonNegative(modelScale)) {
    issues.push({ path: `${path}.modelScale`, message: "Expected non-negative number" });
  }
  if (!isId(id) || !isId(modelInfoId) || !isNonNegative(modelScale)) {
    return undefined;
  }
  return { id, modelInfoId, modelScale };
};

const parseAll = <T>(
  values: unknown[],
  key: string,
  parse: (value: unknown, path: string, issues: GameDataValidationIssue[]) => T | undefined,
  issues: GameDataValidationIssue[],
): T[] => {
  const parsed: T[] = [];
  values.forEach((value, index) => {
    const entry = parse(value, `${key}[${index}]`, issues);
    if (entry !== undefined) {
      parsed.push(entry);
    }
  });
  return parsed;
};

// Every entry after the first with an already seen key is reported
const reportDuplicates = <T>(
  entries: T[],
  keyOf: (entry: T) => string,
  issueFor: (entry: T) => GameDataValidationIssue,
  issues: GameDataValidationIssue[],
): void => {
  const seen = new Set<string>();
  for (const entry of entries) {
    const key = keyOf(entry);
    if (seen.has(key)) {
      issues.push(issueFor(entry));
    }
    seen.add(key);
  }
};

/**
 * Validate parsed JSON as game data. Collects every issue before throwing.
 */
export const parseGameData = (value: unknown): GameDataDefinition => {
  const issues: GameDataValidationIssue[] = [];
  if (!isRecord(value)) {
    throw new GameDataValidationError([{ path: "$", message: "Expected object" }]);
  }

  const spellBases = parseAll(readList(value, "spellBases", issues), "spellBases", parseSpellBase, issues);
  const spellTiers = parseAll(readList(value, "spellTiers", issues), "spellTiers", parseSpellTier, issues);
  const creatureModels = parseAll(
    readList(value, "creatureModels", issues),
    "creatureModels",
    parseCreatureModel,
    issues,
  );
  const creatures = parseAll(readList(value, "creatures", issues), "creatures", parseCreature, issues);

  reportDuplicates(
    spellBases,
    (base) => String(base.id),
    (base) => ({ path: `spellBases(${base.id}).id`, message: `Duplicate base spell id ${base.id}` }),
    issues,
  );
  reportDuplicates(
    spellTiers,
    (tier) => String(tier.id),
    (tier) => ({ path: `spellTiers(${tier.id}).id`, message: `Duplicate spell id ${tier.id}` }),
    issues,
  );
  reportDuplicates(
    spellTiers,
    (tier) => `${tier.baseId}:${tier.tierIndex}`,
    (tier) => ({
      path: `spellTiers(${tier.id}).tierIndex`,
      message: `Duplicate tier ${tier.tierIndex} of base spell ${tier.baseId}`,
    }),
    issues,
  );
  reportDuplicates(
    creatureModels,
    (model) => String(model.id),
    (model) => ({ path: `creatureModels(${model.id}).id`, message: `Duplicate creature model id ${model.id}` }),
    issues,
  );
  reportDuplicates(
    creatures,
    (creature) => String(creature.id),
    (creature) => ({ path: `creatures(${creature.id}).id`, message: `Duplicate creature id ${creature.id}` }),
    issues,
  );

  const baseIds = new Set(spellBases.map((base) => base.id));
  for (const tier of spellTiers) {
    if (!baseIds.has(tier.baseId)) {
      issues.push({ path: `spellTiers(${tier.id}).baseId`, message: `Unknown base spell ${tier.baseId}` });
    }
  }

  if (issues.length > 0) {
    throw new GameDataValidationError(issues);
  }
  return { spellBases, spellTiers, creatureModels, creatures };
};
