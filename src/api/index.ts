/**
 * API Module
 * Middleware, helpers, and route handlers for the HTTP surface
 */

export * from "./body-limit";
export * from "./error-codes";
export * from "./handlers";
export * from "./health";
export * from "./request-context";
export * from "./responses";
export * from "./shutdown";
