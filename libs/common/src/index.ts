export * from "./asset.js";
export * from "./errors.js";
export * from "./events.js";
export * from "./ids.js";
export * from "./json.js";
export * from "./loan.js";
export * from "./path.js";
export * from "./swap.js";
export * from "./venue.js";
