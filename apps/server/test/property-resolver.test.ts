import { describe, expect, it } from "vitest";
import { PropertyModifierStore } from "../src/combat/property-modifier-store";
import { PropertyResolver, orderByPriority } from "../src/combat/property-resolver";
import {
  flat,
  levelScaled,
  percentage,
  type PropertyAlteration,
  type SpellPropertyModifier,
} from "../src/combat/spell-modifier";

const healthModifier = (
  priority: number,
  ...alterations: PropertyAlteration[]
): SpellPropertyModifier => ({
  property: "maxHealth",
  priority,
  alterations,
});

const createResolver = (): { store: PropertyModifierStore; resolver: PropertyResolver } => {
  const store = new PropertyModifierStore();
  return { store, resolver: new PropertyResolver(store) };
};

describe("PropertyResolver", () => {
  it("returns the base value when no modifiers exist", () => {
    const { resolver } = createResolver();

    expect(resolver.resolve("maxHealth", 250, { level: 10 })).toBe(250);
  });

  it("applies higher priority modifiers first", () => {
    const { store, resolver } = createResolver();
    // added lowest priority first to show insertion order does not matter
    store.addOrReplace(2, healthModifier(5, flat(10)));
    store.addOrReplace(1, healthModifier(10, percentage(2)));

    // (5 * 2) + 10
    expect(resolver.resolve("maxHealth", 5, { level: 1 })).toBe(20);
  });

  it("lets a percentage scale earlier flat additions when it runs later", () => {
    const { store, resolver } = createResolver();
    store.addOrReplace(1, healthModifier(1, percentage(2)));
    store.addOrReplace(2, healthModifier(5, flat(10)));

    // (5 + 10) * 2
    expect(resolver.resolve("maxHealth", 5, { level: 1 })).toBe(30);
  });

  it("keeps store order for equal priorities", () => {
    const flatFirst = createResolver();
    flatFirst.store.addOrReplace(1, healthModifier(0, flat(10)));
    flatFirst.store.addOrReplace(2, healthModifier(0, percentage(2)));

    const percentageFirst = createResolver();
    percentageFirst.store.addOrReplace(2, healthModifier(0, percentage(2)));
    percentageFirst.store.addOrReplace(1, healthModifier(0, flat(10)));

    expect(flatFirst.resolver.resolve("maxHealth", 5, { level: 1 })).toBe(30);
    expect(percentageFirst.resolver.resolve("maxHealth", 5, { level: 1 })).toBe(20);
  });

  it("applies the alterations of one modifier in their defined order", () => {
    const { store, resolver } = createResolver();
    store.addOrReplace(1, healthModifier(0, flat(5), percentage(3)));
    store.addOrReplace(2, {
      property: "strength",
      priority: 0,
      alterations: [percentage(3), flat(5)],
    });

    expect(resolver.resolve("maxHealth", 0, { level: 1 })).toBe(15);
    expect(resolver.resolve("strength", 0, { level: 1 })).toBe(5);
  });

  it("scales level based alterations with the level context", () => {
    const { store, resolver } = createResolver();
    store.addOrReplace(1, healthModifier(0, levelScaled(2, 1)));

    expect(resolver.resolve("maxHealth", 100, { level: 10 })).toBe(121);
    expect(resolver.resolve("maxHealth", 100, { level: 20 })).toBe(141);
  });

  it("evaluates function valued percentages at level one", () => {
    const { store, resolver } = createResolver();
    store.addOrReplace(1, healthModifier(0, { modType: "percentage", value: (level) => level + 1 }));

    expect(resolver.resolve("maxHealth", 10, { level: 50 })).toBe(20);
  });

  it("is deterministic for the same inputs", () => {
    const { store, resolver } = createResolver();
    store.addOrReplace(1, healthModifier(3, flat(7), percentage(1.5)));
    store.addOrReplace(2, healthModifier(3, levelScaled(1)));
    store.addOrReplace(3, healthModifier(9, percentage(0.5)));

    const first = resolver.resolve("maxHealth", 40, { level: 12 });
    const second = resolver.resolve("maxHealth", 40, { level: 12 });

    // 40 * 0.5 = 20, (20 + 7) * 1.5 = 40.5, 40.5 + 12 = 52.5
    expect(first).toBe(52.5);
    expect(second).toBe(first);
  });

  it("does not clamp or round the result", () => {
    const { store, resolver } = createResolver();
    store.addOrReplace(1, healthModifier(0, flat(-20), percentage(0.5)));

    expect(resolver.resolve("maxHealth", 5, { level: 1 })).toBe(-7.5);
  });

  it("only uses modifiers of the requested property", () => {
    const { store, resolver } = createResolver();
    store.addOrReplace(1, healthModifier(0, flat(100)));

    expect(resolver.resolve("strength", 10, { level: 1 })).toBe(10);
  });
});

describe("orderByPriority", () => {
  it("sorts descending without mutating its input", () => {
    const low = healthModifier(1, flat(1));
    const high = healthModifier(9, flat(2));
    const input = [low, high];

    expect(orderByPriority(input)).toEqual([high, low]);
    expect(input).toEqual([low, high]);
  });
});
