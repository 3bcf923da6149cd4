// Public surface of the server package.

export { loadAppConfig, type AppConfig } from "./app-config";
export * from "./combat/index";
export * from "./data/index";
export { DisableRules, type DisableRuleSeed } from "./rules/disable-rules";
export { ServerCreature } from "./world/entities/creature";
export { ServerPlayer } from "./world/entities/player";
export { UnitEntity, type UnitServices } from "./world/entities/unit-entity";
export { World, bootWorld, createUnitServices } from "./world/world";
