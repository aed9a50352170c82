export * from "./client.js";
export * from "./content.js";
export * from "./cookies.js";
export * from "./env.js";
export * from "./errors.js";
export * from "./events.js";
export * from "./http.js";
export * from "./logger.js";
export * from "./logs.js";
export * from "./request.js";
export * from "./requestFile.js";
export * from "./response.js";
export * from "./schemas.js";
export * from "./transport.js";
