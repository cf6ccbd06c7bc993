export { createAuthCore } from "./framework.js";
export * from "./bootstrap.js";
export * from "./config.js";
export * from "./logger.js";

export * from "./types.js";
export * from "./errors/codes.js";
export * from "./errors/error.js";

export * from "./adapters/types.js";
export * from "./token/types.js";

export * from "./token/authorities.js";
export * from "./token/signingKey.js";
export * from "./token/jwtTokenIssuer.js";

export * from "./employees/types.js";
export * from "./employees/adapters.js";
export * from "./employees/employeeManagement.js";
export * from "./employees/memoryRepository.js";
export * from "./employees/bcryptPasswordHasher.js";
