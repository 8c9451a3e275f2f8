export type * from "./domain.js";
export type * from "./auth.js";
export type * from "./audit.js";
export type * from "./email.js";
export type * from "./api.js";
export type * from "./job.js";
export type * from "./config.js";
