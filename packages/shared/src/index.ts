export type * from "./quotes.js";
export type * from "./jobs.js";
export type * from "./costs.js";
export type * from "./events.js";
export type * from "./api.js";
