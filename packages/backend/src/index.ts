export { Backend, type BackendOptions, type BackendStats } from "./backend.js";
export { ConfigError, loadConfig, MAX_SYSTEM_NAME_BYTES, type BackendConfig } from "./config.js";
export { applySeed, loadSeedFile, seedSchema, type SeedData } from "./repository/seed.js";
export { SessionRepository, type SessionData } from "./repository/session-repository.js";
export { TokenRepository, type TokenData } from "./repository/token-repository.js";
export { UsageRepository } from "./repository/usage-repository.js";
export { UserRepository, type UserData } from "./repository/user-repository.js";
export { KeyService } from "./service/key-service.js";
export { SessionService, type SessionServiceOptions } from "./service/session-service.js";
export { TagVerificationService } from "./service/tag-verification-service.js";
export { UsageService } from "./service/usage-service.js";
export { TerminalUseCase } from "./usecase/terminal-usecase.js";
export { createTagRoutes } from "./presentation/rest/tag-routes.js";
export { createTerminalRoutes, isAuthorized, statusFor } from "./presentation/rest/terminal-routes.js";
export { handleTerminalWebSocket, type TerminalSocket } from "./presentation/ws/terminal-ws.js";
export { BackendError } from "./shared/errors.js";
export {
  calculateSessionExpiration,
  DEFAULT_SESSION_TIMEZONE,
  isSessionExpired,
} from "./shared/session-expiration.js";
export { createApp, startServer, TERMINAL_WS_PATH, type RunningServer, type ServerOptions } from "./server.js";
