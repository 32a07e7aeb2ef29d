/**
 * HTTP server.
 */

export { createApp, type AppOptions } from "./app.js";
export { toErrorResponse, type ErrorBody, type ErrorCode, type ErrorResponse } from "./errors.js";
export { saveUserData, sortKeys, userDataFileName } from "./user-data.js";
